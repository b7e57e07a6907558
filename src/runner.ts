import type { Server } from "node:http";
import express, { type Express } from "express";
import { ConfigurationError, type PipelineErrorCode } from "./errors";
import type { WebhookRequest } from "./handler";
import type { TurnReport, WebhookService } from "./service";

export const DEFAULT_PORT = 8080;

export interface RunnerRequest extends WebhookRequest {
  path: string;
}

export interface RunnerResponse {
  status: number;
  /** A string is sent as text/plain (handshake challenges), anything else as JSON */
  body: unknown;
}

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  STORE_UNAVAILABLE: 500,
  MODEL_UNAVAILABLE: 503,
  CANCELLED: 503,
  INVALID_PAYLOAD: 400,
};

export function normalizeRoute(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Hosts every configured Service behind one HTTP listener, one Service per
 * webhook route. An unknown route is a routing miss, answered before any
 * pipeline runs.
 */
export class ServicesRunner {
  readonly app: Express;
  private readonly services = new Map<string, WebhookService>();
  private server: Server | null = null;

  constructor(
    services: readonly WebhookService[],
    private readonly port: number = DEFAULT_PORT,
  ) {
    for (const service of services) {
      const route = normalizeRoute(service.route);
      if (this.services.has(route)) {
        throw new ConfigurationError(`Duplicate webhook route ${route}`);
      }
      this.services.set(route, service);
    }

    this.app = express();
    this.app.use(express.json({ limit: "1mb" }));
    this.app.use((req, res, next) => {
      this.dispatch({
        method: req.method,
        path: req.path,
        headers: req.headers,
        query: req.query,
        body: req.body,
      })
        .then((out) => {
          res.status(out.status);
          if (typeof out.body === "string") res.type("text/plain").send(out.body);
          else res.json(out.body);
        })
        .catch(next);
    });
  }

  get routes(): string[] {
    return [...this.services.keys()];
  }

  async dispatch(request: RunnerRequest): Promise<RunnerResponse> {
    const route = normalizeRoute(request.path);
    const service = this.services.get(route);
    if (!service) {
      return { status: 404, body: { error: "ROUTE_NOT_FOUND", route } };
    }

    const challenge = service.handshake(request);
    if (challenge !== null) {
      console.log(`[runner] ${service.platform} handshake on ${route}`);
      return { status: 200, body: challenge };
    }
    if (request.method !== "POST") {
      return request.method === "GET"
        ? { status: 403, body: { error: "HANDSHAKE_REJECTED" } }
        : { status: 405, body: { error: "METHOD_NOT_ALLOWED" } };
    }

    if (service.isRedelivery(request)) {
      console.log(`[runner] POST ${route} -> 200 (redelivery skipped)`);
      return { status: 200, body: { redelivery: true } };
    }

    const report = await service.process(request.body);
    const status = statusFor(report);
    console.log(
      `[runner] POST ${route} -> ${status} (${report.replied} replied, ${report.failures.length} failed)`,
    );
    return { status, body: report };
  }

  /** Bind the port. Resolves with the port actually bound (useful with 0). */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        resolve(typeof address === "object" && address ? address.port : this.port);
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function statusFor(report: TurnReport): number {
  let status = 200;
  for (const failure of report.failures) {
    status = Math.max(status, STATUS_BY_CODE[failure.code]);
  }
  return status;
}
