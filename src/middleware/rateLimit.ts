import rateLimit from "express-rate-limit";
import { getEnv } from "../config/env.js";

export function createRecommendRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.RECOMMEND_RATE_WINDOW_MS,
    max: env.RECOMMEND_RATE_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      status: "error",
      error: "rate_limited",
      message: "Too many requests, please try again later",
      retryInSeconds: Math.ceil(env.RECOMMEND_RATE_WINDOW_MS / 1000),
    },
    keyGenerator: (req) => {
      const forwarded = req.headers["x-forwarded-for"];
      if (typeof forwarded === "string") {
        const [first] = forwarded.split(",");
        if (first && first.trim()) {
          return first.trim();
        }
      }
      return req.ip ?? "unknown";
    },
  });
}
