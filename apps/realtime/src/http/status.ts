/**
 * HTTP status endpoint.
 *
 * Endpoints:
 * - GET /health - Role, current playback state and live sessions
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { VERSION, type PlaybackState } from "@lockstep/shared";
import type { SessionStatus } from "../session/session.js";

export interface StatusSnapshot {
  role: "authority" | "follower";
  state: PlaybackState | null;
  sessions: SessionStatus[];
}

export type StatusSource = () => StatusSnapshot;

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * Handle a status request.
 * @returns true if the request was handled
 */
export function handleStatusRequest(
  req: IncomingMessage,
  res: ServerResponse,
  source: StatusSource
): boolean {
  const url = new URL(req.url ?? "/", "http://localhost");

  if (req.method === "GET" && url.pathname === "/health") {
    const { role, state, sessions } = source();
    sendJson(res, 200, { status: "ok", version: VERSION, role, state, sessions });
    return true;
  }

  return false;
}

export function createStatusServer(source: StatusSource): Server {
  return createServer((req, res) => {
    if (handleStatusRequest(req, res, source)) {
      return;
    }
    sendJson(res, 404, { error: "Not found" });
  });
}
