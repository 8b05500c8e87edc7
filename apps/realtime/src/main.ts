import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";

// Load environment variables from .env.local
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const envPath = resolve(__dirname, "../.env.local");
dotenv.config({ path: envPath });

import type { Server } from "http";
import { VERSION } from "@lockstep/shared";
import { AuthorityServer } from "./authority/server.js";
import { loadConfig, type Config } from "./config.js";
import { describeError } from "./errors.js";
import { FollowerClient } from "./follower/client.js";
import { tcpConnector } from "./follower/connector.js";
import { createStatusServer, type StatusSource } from "./http/status.js";
import { HeadlessPlayer } from "./player/headless.js";

interface Participant {
  status: StatusSource;
  onFatal(listener: (error: Error) => void): () => void;
  stop(): Promise<void>;
}

async function startAuthority(config: Config, player: HeadlessPlayer): Promise<Participant> {
  const authority = new AuthorityServer(player, {
    name: config.NAME,
    probeIntervalMs: config.PROBE_INTERVAL_MS,
    handshakeTimeoutMs: config.HANDSHAKE_TIMEOUT_MS,
    livenessWindowMs: config.LIVENESS_WINDOW_MS,
    fullStateIntervalMs: config.FULL_STATE_INTERVAL_MS,
    driftToleranceMs: config.DRIFT_TOLERANCE_MS,
    eventQueueSize: config.ACTION_QUEUE_SIZE,
  });
  await authority.start();
  const address = await authority.listen(config.PORT, config.HOST);
  console.log(`[realtime] authority listening on ${address.address}:${address.port}`);

  return {
    status: () => authority.getStatus(),
    onFatal: (listener) => authority.onFatal(listener),
    stop: () => authority.stop(),
  };
}

function startFollower(config: Config, player: HeadlessPlayer): Participant {
  const follower = new FollowerClient(
    player,
    {
      name: config.NAME,
      probeIntervalMs: config.PROBE_INTERVAL_MS,
      handshakeTimeoutMs: config.HANDSHAKE_TIMEOUT_MS,
      livenessWindowMs: config.LIVENESS_WINDOW_MS,
      driftToleranceMs: config.DRIFT_TOLERANCE_MS,
      degradedToleranceMs: config.DEGRADED_TOLERANCE_MS,
      rateTolerance: config.RATE_TOLERANCE,
      followMedia: config.FOLLOW_MEDIA,
      echoWindowMs: config.ECHO_WINDOW_MS,
      actionQueueSize: config.ACTION_QUEUE_SIZE,
      playerRetryAttempts: config.PLAYER_RETRY_ATTEMPTS,
      playerRetryBaseMs: config.PLAYER_RETRY_BASE_MS,
      reconnectBaseMs: config.RECONNECT_BASE_MS,
      reconnectMaxMs: config.RECONNECT_MAX_MS,
      reconnectMaxAttempts: config.RECONNECT_MAX_ATTEMPTS,
    },
    tcpConnector(config.HOST, config.PORT)
  );
  follower.start();
  console.log(`[realtime] following ${config.HOST}:${config.PORT}`);

  return {
    status: () => follower.getStatus(),
    onFatal: (listener) => follower.onFatal(listener),
    stop: () => follower.stop(),
  };
}

function listenStatus(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`[realtime] starting role=${config.ROLE} name=${config.NAME} version=${VERSION}`);

  const player = new HeadlessPlayer({
    mediaRef: config.MEDIA_REF,
    paused: config.ROLE === "follower" || config.MEDIA_REF === "",
  });

  const participant =
    config.ROLE === "authority" ? await startAuthority(config, player) : startFollower(config, player);

  let statusServer: Server | null = null;
  if (config.STATUS_PORT !== undefined) {
    statusServer = createStatusServer(participant.status);
    await listenStatus(statusServer, config.STATUS_PORT, config.HOST);
    console.log(`[realtime] status on port ${config.STATUS_PORT}`);
  }

  let stopping = false;
  const shutdown = async (exitCode: number) => {
    if (stopping) return;
    stopping = true;
    await participant.stop();
    statusServer?.close();
    process.exit(exitCode);
  };

  participant.onFatal(() => {
    shutdown(1).catch((error: unknown) => {
      console.error(`[realtime] shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      console.log(`[realtime] ${signal} received, stopping`);
      shutdown(0).catch((error: unknown) => {
        console.error(`[realtime] shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error(`[realtime] failed to start: ${describeError(error)}`);
  process.exit(1);
});
