import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // File tracing does not detect the dynamic fs reads under data/calendar.
  outputFileTracingIncludes: {
    "/*": ["./data/**/*"]
  }
};

export default nextConfig;
