import type { RouteObject } from "react-router-dom";
import { Link, Navigate } from "react-router-dom";

import AppLayout from "@/layout/AppLayout";
import HomePage from "@/pages/HomePage";
import ReaderPage from "@/pages/ReaderPage";

/**
 * RouteModule: self-contained unit that can be registered under a base path.
 * `fullscreen` modules render without the app shell.
 */
export type RouteModule = {
  base: string;
  routes: RouteObject[];
  label?: string;
  fullscreen?: boolean;
};

export const readerModule: RouteModule = {
  base: "/read",
  label: "Reader",
  fullscreen: true,
  routes: [{ index: true, element: <ReaderPage /> }],
};

export const ROUTE_MODULES: RouteModule[] = [readerModule];

const NotFoundPage = () => (
  <div style={{ padding: 32 }}>
    <h1 style={{ fontSize: 20, margin: 0 }}>404</h1>
    <p style={{ color: "#6b7280" }}>Page not found.</p>
    <Link to="/">Go home</Link>
  </div>
);

export function buildRoutes(): RouteObject[] {
  const fullscreen = ROUTE_MODULES.filter((m) => m.fullscreen);
  const framed = ROUTE_MODULES.filter((m) => !m.fullscreen);

  return [
    ...fullscreen.map((m) => ({ path: m.base, children: m.routes })),
    { path: "/404", element: <NotFoundPage /> },
    {
      path: "/",
      element: <AppLayout />,
      children: [
        { index: true, element: <HomePage /> },
        ...framed.map((m) => ({ path: m.base, children: m.routes })),
        { path: "*", element: <Navigate to="/404" replace /> },
      ],
    },
  ];
}
