/**
 * Control Server
 *
 * Status and remote stop for a running test. Off by default; bind to
 * localhost unless the rig network is trusted.
 *
 *   GET  /health   liveness + build metadata
 *   GET  /status   loop states, coverage, counts, stop state
 *   POST /stop     {reason?} → request a stop (source: operator)
 *
 * Socket.IO namespace /capture relays loop events ('loop:state',
 * 'loop:artifact', 'loop:gap', 'loop:setpoint', 'test:stop') and accepts a
 * 'stop' message.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer, type Server as HttpServer } from 'http';
import { Server as SocketIOServer, type Namespace } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { config } from '../config.js';
import { log, Logger } from '../utils/logger.js';
import { NotFoundError, ValidationError, handleError } from '../utils/errors.js';
import type { StopFlag, StopRequest } from '../types/capture-types.js';
import type { LoopStatus } from '../core/acquisition-loop.js';

export interface SessionStatus {
  testId: string;
  testName: string;
  startedAt: string | null;
  stop: StopRequest | null;
  loops: LoopStatus[];
}

export interface StatusProvider {
  status(): SessionStatus;
}

export interface ControlServerOptions {
  host: string;
  port: number;
  stop: StopFlag;
  provider: StatusProvider;
  logger?: Logger;
}

const StopBodySchema = z
  .object({
    reason: z.string().min(1).max(200).optional(),
  })
  .strict();

const NAMESPACE = '/capture';

export class ControlServer {
  private readonly app: Express;
  private readonly httpServer: HttpServer;
  private readonly io: SocketIOServer;
  private readonly namespace: Namespace;
  private readonly options: ControlServerOptions;
  private readonly logger: Logger;

  constructor(options: ControlServerOptions) {
    this.options = options;
    this.logger = (options.logger ?? log).child({ service: 'control-server' });
    this.app = express();
    this.httpServer = createServer(this.app);
    this.io = new SocketIOServer(this.httpServer, {
      cors: {
        origin: '*',
        methods: ['GET', 'POST'],
      },
    });
    this.namespace = this.io.of(NAMESPACE);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupSocket();
  }

  /** Resolves with the bound port (useful with port 0) */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.httpServer.once('error', onError);
      this.httpServer.listen(this.options.port, this.options.host, () => {
        this.httpServer.off('error', onError);
        const address = this.httpServer.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
        this.logger.info('Control server listening', { host: this.options.host, port });
        resolve(port);
      });
    });
  }

  async close(): Promise<void> {
    this.namespace.disconnectSockets(true);
    await new Promise<void>((resolve, reject) => {
      this.io.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.info('Control server closed');
  }

  /** Relay an event to every /capture client */
  broadcast(event: string, payload: unknown): void {
    this.namespace.emit(event, payload);
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json({ limit: '16kb' }));

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      const header = req.headers['x-request-id'];
      const requestId = typeof header === 'string' ? header : uuidv4();
      res.setHeader('X-Request-ID', requestId);

      res.on('finish', () => {
        this.logger.debug(`${req.method} ${req.path}`, {
          requestId,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
        });
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        service: config.serviceName,
        version: config.version,
        buildId: config.buildId,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/status', (_req: Request, res: Response) => {
      res.json({ success: true, data: this.options.provider.status() });
    });

    this.app.post('/stop', (req: Request, res: Response, next: NextFunction) => {
      const parsed = StopBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        next(
          new ValidationError(
            'Invalid stop request',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
            { operation: 'stop' }
          )
        );
        return;
      }

      const alreadyRequested = this.options.stop.isStopRequested();
      this.options.stop.requestStop('operator', parsed.data.reason ?? 'remote stop');
      res.status(202).json({ success: true, data: { alreadyRequested } });
    });

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      next(new NotFoundError('Endpoint', `${req.method} ${req.path}`, { operation: 'route' }));
    });

    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      // body-parser marks unreadable bodies with status 400
      const error =
        'status' in err && err.status === 400
          ? new ValidationError('Malformed request body', [err.message], { operation: req.path })
          : handleError(err);
      const requestId = res.getHeader('X-Request-ID');

      if (error.statusCode >= 500) {
        this.logger.error('Request failed', err, { requestId, method: req.method, path: req.path, code: error.code });
      } else {
        this.logger.warn('Request rejected', { requestId, method: req.method, path: req.path, code: error.code });
      }

      res.status(error.statusCode).json({
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error instanceof ValidationError && { issues: error.issues }),
        },
      });
    });
  }

  private setupSocket(): void {
    this.namespace.on('connection', (socket) => {
      this.logger.info('Client connected', { socketId: socket.id });
      socket.emit('status', this.options.provider.status());

      socket.on('stop', (payload: unknown, ack?: unknown) => {
        const parsed = StopBodySchema.safeParse(payload ?? {});
        const reason = parsed.success ? parsed.data.reason : undefined;
        const alreadyRequested = this.options.stop.isStopRequested();
        this.options.stop.requestStop('operator', reason ?? `remote stop (${socket.id})`);
        if (typeof ack === 'function') {
          ack({ accepted: true, alreadyRequested });
        }
      });

      socket.on('disconnect', () => {
        this.logger.info('Client disconnected', { socketId: socket.id });
      });
    });
  }
}
