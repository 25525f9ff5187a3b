import { timingSafeEqual } from "node:crypto";
import type { RequestHandler } from "express";

const BEARER_PREFIX = "Bearer ";

const tokensMatch = (provided: string, expected: string): boolean => {
  const left = Buffer.from(provided);
  const right = Buffer.from(expected);
  return left.length === right.length && timingSafeEqual(left, right);
};

/**
 * Rejects requests without the configured bearer token.
 * An unset key answers 401 for everyone; a wrong token answers 403.
 */
export const bearerAuth =
  (apiKey: string): RequestHandler =>
  (req, res, next) => {
    if (!apiKey) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    const header = req.get("authorization") ?? "";
    if (!header.startsWith(BEARER_PREFIX)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    if (!tokensMatch(header.slice(BEARER_PREFIX.length), apiKey)) {
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    next();
  };
