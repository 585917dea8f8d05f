import type { NextConfig } from "next";

// API responses carry per-user data and must never be cached by an
// intermediary. CORS for the auth endpoints is answered in their OPTIONS
// handlers so pre-flights never reach the rate limiter.
const nextConfig: NextConfig = {
  poweredByHeader: false,
  async headers() {
    return [
      {
        source: "/api/:path*",
        headers: [
          {
            key: "Cache-Control",
            value: "no-store",
          },
          {
            key: "X-Content-Type-Options",
            value: "nosniff",
          },
        ],
      },
    ];
  },
};

export default nextConfig;
