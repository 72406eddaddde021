import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import {
  HttpError,
  InvalidInputError,
  NotFoundError,
  logger as defaultLogger,
  type Logger,
} from '@taskplanner/shared';
import type { PlannerService } from '@taskplanner/core';

/** The parts of the planner the HTTP surface calls. */
export type PlannerApi = Pick<PlannerService, 'createPlan' | 'getPlan' | 'health' | 'llmStatus'>;

export interface PlannerServerOptions {
  service: PlannerApi;
  logger?: Logger;
  /** Largest accepted request body. Default: 1 MiB */
  maxBodyBytes?: number;
}

interface JsonResponse {
  status: number;
  body: unknown;
}

const CreatePlanBodySchema = z.object({ goal: z.string() });

const PLAN_BY_ID = /^\/api\/plan\/([^/]+)$/;

/**
 * JSON API over the planner:
 *
 * - `POST /api/plan` `{ goal }` creates and stores a plan
 * - `GET /api/plan/:id` returns a stored plan
 * - `GET /api/health`
 * - `GET /api/llm-status`
 */
export function createPlannerServer(options: PlannerServerOptions): http.Server {
  const logger = options.logger ?? defaultLogger;
  const maxBodyBytes = options.maxBodyBytes ?? 1024 * 1024;

  const route = async (req: http.IncomingMessage, pathname: string): Promise<JsonResponse> => {
    const method = req.method ?? 'GET';

    if (pathname === '/api/plan') {
      if (method !== 'POST') throw new HttpError(405, 'Method not allowed');
      const goal = parseGoal(await readBody(req, maxBodyBytes));
      const { id, plan, llm_method } = await options.service.createPlan(goal);
      return {
        status: 200,
        body: { success: true, plan: { ...plan, id, llm_method }, llm_method },
      };
    }

    const byId = PLAN_BY_ID.exec(pathname);
    if (byId) {
      if (method !== 'GET') throw new HttpError(405, 'Method not allowed');
      const rawId = byId[1] ?? '';
      if (!/^\d+$/.test(rawId)) throw new NotFoundError(`Invalid plan id "${rawId}"`);
      return { status: 200, body: { success: true, plan: options.service.getPlan(Number(rawId)) } };
    }

    if (pathname === '/api/health') {
      if (method !== 'GET') throw new HttpError(405, 'Method not allowed');
      return { status: 200, body: options.service.health() };
    }

    if (pathname === '/api/llm-status') {
      if (method !== 'GET') throw new HttpError(405, 'Method not allowed');
      return { status: 200, body: await options.service.llmStatus() };
    }

    throw new HttpError(404, 'Not found');
  };

  const toErrorResponse = async (error: unknown): Promise<JsonResponse> => {
    if (error instanceof InvalidInputError) {
      return { status: 400, body: { error: error.message } };
    }
    if (error instanceof NotFoundError) {
      return { status: 404, body: { error: 'Plan not found' } };
    }
    if (error instanceof HttpError) {
      return { status: error.statusCode, body: { error: error.message } };
    }

    const err = error instanceof Error ? error : new Error(String(error));
    await logger.error(err, 'Request failed');
    return { status: 500, body: { success: false, error: err.message } };
  };

  return http.createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    route(req, pathname)
      .catch(toErrorResponse)
      .then(async ({ status, body }) => {
        await logger.debug(`${req.method ?? 'GET'} ${pathname} -> ${status}`);
        const payload = JSON.stringify(body);
        res.writeHead(status, {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(payload),
        });
        res.end(payload);
      })
      .catch((error: unknown) => {
        res.destroy(error instanceof Error ? error : undefined);
      });
  });
}

async function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    // Oversized bodies are still drained so the response reaches the client.
    if (size <= limit) chunks.push(buffer);
  }
  if (size > limit) {
    throw new HttpError(413, 'Request body too large');
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Goal from a request body. Bodies that are not JSON, or carry no string
 * goal, are treated as an empty goal.
 */
function parseGoal(raw: string): string {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new InvalidInputError('Goal is required', { cause: error });
  }
  const parsed = CreatePlanBodySchema.safeParse(json);
  const goal = parsed.success ? parsed.data.goal.trim() : '';
  if (!goal) {
    throw new InvalidInputError();
  }
  return goal;
}

export interface ListenOptions {
  host: string;
  port: number;
}

/** Starts listening; resolves with the bound address (useful with port 0). */
export function startServer(server: http.Server, options: ListenOptions): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(options.port, options.host, () => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      resolve(address);
    });
  });
}

export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
