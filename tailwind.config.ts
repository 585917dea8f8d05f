import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        brand: "#10b981",
        missed: "#f87171",
        surface: {
          700: "#1a1a2e",
          800: "#12121c",
          900: "#0a0a0f",
        },
      },
    },
  },
  plugins: [],
};

export default config;
