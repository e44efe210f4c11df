/**
 * Base layout for the watcher dashboard.
 *
 * Pico CSS for classless styling, HTMX for polling and the control buttons.
 */
import type { FC, PropsWithChildren } from "hono/jsx";

type BaseLayoutProps = PropsWithChildren<{
  title: string;
}>;

export const BaseLayout: FC<BaseLayoutProps> = ({ title, children }) => (
  <html lang="en" data-theme="dark">
    <head>
      <meta charset="utf-8" />
      <meta name="viewport" content="width=device-width, initial-scale=1" />
      <meta name="color-scheme" content="dark" />

      <title>{title}</title>

      {/* Pico CSS - Classless styling */}
      <link
        rel="stylesheet"
        href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css"
      />

      {/* HTMX - must use closing tag for HTML script */}
      <script src="https://unpkg.com/htmx.org@2">{""}</script>
    </head>
    <body>
      <main class="container" style="padding-top: 2rem;">
        {children}
      </main>
    </body>
  </html>
);
