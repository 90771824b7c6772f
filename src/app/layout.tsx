import type { Metadata } from "next";
import { Toaster } from "sonner";

import { NavBar } from "@/components/shell/NavBar";
import "./globals.css";

export const metadata: Metadata = {
  title: "Memory Lab | Paging & Fragmentation Simulator",
  description: "Step through page replacement under LRU and Optimal, and watch first-fit allocation fragment memory.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" className="dark">
      <body className="app-shell antialiased">
        <div className="app-bg" aria-hidden />
        <NavBar />
        <div className="relative z-10">{children}</div>
        <Toaster theme="dark" richColors position="bottom-right" />
      </body>
    </html>
  );
}
