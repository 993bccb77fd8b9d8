/**
 * Read-only HTTP surface over the scheduler state.
 *
 *   GET /health   scheduler snapshot plus the effective schedule
 *   GET /metrics  run counters
 *   GET /         small HTML index
 */

import http from "node:http";
import type { RetryPolicy, SchedulerSnapshot } from "../cron/types.ts";
import { consoleLogger, type Logger } from "./logger.ts";
import { APP_NAME, getVersion } from "../version.ts";

export interface SnapshotSource {
  snapshot(): SchedulerSnapshot;
}

export interface HealthInfo {
  schedule: string;
  timezone: string;
  workflowId?: string;
  retry: RetryPolicy;
  scheduleEnabled: boolean;
}

export interface HealthResponse {
  status: number;
  contentType: string;
  body: string;
}

const INDEX_HTML = `<!doctype html>
<html>
<head><title>${APP_NAME}</title></head>
<body>
  <h1>${APP_NAME}</h1>
  <ul>
    <li><a href="/health">Health</a></li>
    <li><a href="/metrics">Metrics</a></li>
  </ul>
</body>
</html>
`;

function json(status: number, payload: unknown): HealthResponse {
  return { status, contentType: "application/json", body: JSON.stringify(payload) };
}

export function handleHealthRequest(
  method: string,
  url: string,
  source: SnapshotSource,
  info: HealthInfo,
  now: Date = new Date(),
  bootedAt: Date = now,
): HealthResponse {
  if (method !== "GET" && method !== "HEAD") {
    return json(405, { error: "Method not allowed" });
  }

  let pathname: string;
  try {
    ({ pathname } = new URL(url, "http://localhost"));
  } catch {
    return json(400, { error: "Bad request" });
  }
  const snapshot = source.snapshot();

  switch (pathname) {
    case "/health":
      return json(200, {
        status: snapshot.lastOutcome === "exhausted" ? "degraded" : "healthy",
        timestamp: now.toISOString(),
        scheduler: snapshot,
        schedule: info.schedule,
        timezone: info.timezone,
        scheduleEnabled: info.scheduleEnabled,
        workflowId: info.workflowId ?? null,
        retry: info.retry,
      });

    case "/metrics":
      return json(200, {
        app: APP_NAME,
        version: getVersion(),
        timestamp: now.toISOString(),
        uptimeSeconds: Math.floor((now.getTime() - bootedAt.getTime()) / 1000),
        totalRuns: snapshot.totalRuns,
        consecutiveFailures: snapshot.consecutiveFailures,
        lastOutcome: snapshot.lastOutcome,
      });

    case "/":
      return { status: 200, contentType: "text/html; charset=utf-8", body: INDEX_HTML };

    default:
      return json(404, { error: "Not found" });
  }
}

export class HealthServer {
  private server: http.Server | null = null;
  private readonly logger: Logger;
  private readonly bootedAt = new Date();

  constructor(
    private readonly source: SnapshotSource,
    private readonly info: HealthInfo,
    private readonly port: number = 8080,
    logger?: Logger,
  ) {
    this.logger = logger ?? consoleLogger("health");
  }

  /** Port actually bound (differs from the requested one when that was 0). */
  get boundPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        let response: HealthResponse;
        try {
          response = handleHealthRequest(
            req.method ?? "GET",
            req.url ?? "/",
            this.source,
            this.info,
            new Date(),
            this.bootedAt,
          );
        } catch (err) {
          this.logger.error(`Failed to handle ${req.method ?? "GET"} ${req.url ?? "/"}: ${String(err)}`);
          response = json(500, { error: "Internal server error" });
        }
        this.logger.debug(`${req.method ?? "GET"} ${req.url ?? "/"} ${response.status}`);
        res.writeHead(response.status, { "Content-Type": response.contentType });
        res.end(req.method === "HEAD" ? undefined : response.body);
      });

      server.once("error", reject);
      server.listen(this.port, () => {
        server.off("error", reject);
        this.server = server;
        this.logger.info(`Listening on http://localhost:${this.boundPort ?? this.port}/health`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
