import * as logger from "firebase-functions/logger";
import { ZodError } from "zod";

type HttpResponse = {
  set(field: string, value: string): unknown;
  status(code: number): { json(body: unknown): unknown };
};

export function setCors(res: HttpResponse) {
  res.set("Access-Control-Allow-Origin", "*");
  res.set("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  res.set("Access-Control-Allow-Headers", "Content-Type, Authorization");
}

export function parseJsonBody(body: unknown): unknown {
  if (!body) return {};
  if (typeof body === "string") {
    try {
      return JSON.parse(body);
    } catch {
      return {};
    }
  }
  return body;
}

/** 400 with the issues for a rejected body, 500 for anything else. */
export function sendError(res: HttpResponse, e: unknown, fallback: string) {
  if (e instanceof ZodError) {
    res.status(400).json({ error: "Invalid request body", issues: e.issues });
    return;
  }
  const message = e instanceof Error ? e.message : fallback;
  logger.error(fallback, { error: message });
  res.status(500).json({ error: message || fallback });
}
