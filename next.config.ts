import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: ["winston", "better-sqlite3"],
};

export default nextConfig;
