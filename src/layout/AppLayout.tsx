import { Outlet } from "react-router-dom";
import TopBar from "./TopBar";

export default function AppLayout() {
  return (
    <div className="app-shell">
      <TopBar />
      <main className="main">
        <Outlet />
      </main>
    </div>
  );
}
