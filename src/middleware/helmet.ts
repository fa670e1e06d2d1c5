import helmet from "helmet";
import { getEnv } from "../config/env.js";

export function createHelmet() {
  const env = getEnv();

  // JSON responses only
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    } : false,
  });
}
