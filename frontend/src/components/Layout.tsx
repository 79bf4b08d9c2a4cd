import type { ReactNode } from "react";

interface Props {
  title: string;
  children: ReactNode;
}

export function Layout({ title, children }: Props) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <script src="https://cdn.tailwindcss.com" />
      </head>
      <body className="min-h-screen bg-gray-50">
        <header className="bg-white border-b border-gray-200 px-6 py-4">
          <div className="max-w-5xl mx-auto flex items-center justify-between">
            <a href="/" className="text-xl font-semibold text-gray-900">
              Tasks
            </a>
          </div>
        </header>
        <main className="max-w-5xl mx-auto px-6 py-6">{children}</main>
      </body>
    </html>
  );
}
