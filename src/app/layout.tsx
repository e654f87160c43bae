import type { ReactNode } from "react";

export const metadata = {
  title: "PMO Watch",
  description: "Asana portfolio health & findings",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
