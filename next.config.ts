import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  devIndicators: false,
  // Loaded from node_modules at runtime rather than bundled.
  serverExternalPackages: ["bull", "mongoose"],
};

export default nextConfig;
