import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  reactStrictMode: true,
  async rewrites() {
    // The form posts to /process; the handler lives under pages/api
    return [{ source: "/process", destination: "/api/process" }];
  },
};

export default nextConfig;
