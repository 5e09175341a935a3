import { useMemo } from "react";
import { createBrowserRouter, RouterProvider } from "react-router-dom";
import { buildRoutes } from "@/router/routes";

export default function App() {
  const router = useMemo(() => createBrowserRouter(buildRoutes()), []);
  return <RouterProvider router={router} />;
}
