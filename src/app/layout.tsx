import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "CHIP-8 Emulator",
  description: "Browser-based CHIP-8 interpreter with a text-mode 64×32 display",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" className="dark">
      <body className="antialiased">{children}</body>
    </html>
  );
}
