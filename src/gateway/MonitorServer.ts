/**
 * Monitor server
 *
 * REST and WebSocket bridge for a UI or a remote operator: live status,
 * activity history, the virtual wire log, and a few control endpoints that
 * go through the same gateway as every other producer.
 */

import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import { AddressInfo } from 'net';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { ActivityLog } from '../core/ActivityLog';
import { CommandGateway, MAX_DURATION_MS, SubmitResult } from '../core/CommandGateway';
import { ConnectionManager } from '../core/ConnectionManager';
import { BusEventName, BusEvents, EventBus, eventBus } from '../core/EventBus';
import { InputModeCoordinator } from '../core/InputModeCoordinator';
import { Action, decode } from '../core/Protocol';
import { VirtualTransport } from '../transports/VirtualTransport';
import { logger } from '../utils/logger';

export interface MonitorConfig {
    port: number;
    host: string;
    apiKey?: string;
    corsOrigins?: string[];
}

export interface MonitorDeps {
    gateway: CommandGateway;
    connections: ConnectionManager;
    coordinator: InputModeCoordinator;
    activity: ActivityLog;
    bus?: EventBus;
}

const CommandBodySchema = z.object({
    char: z.string().length(1),
    durationMs: z.number().int().positive().max(MAX_DURATION_MS).optional()
});

const ModeBodySchema = z.object({
    mode: z.enum(['keyboard', 'voice', 'gesture'])
});

export class MonitorServer {
    private app: express.Application;
    private server: http.Server;
    private wss: WebSocketServer;
    private clients: Set<WebSocket> = new Set();
    private unsubscribers: Array<() => void> = [];
    private readonly monitorConfig: MonitorConfig;
    private readonly bus: EventBus;

    constructor(private readonly deps: MonitorDeps, monitorConfig: Partial<MonitorConfig> = {}) {
        this.bus = deps.bus ?? eventBus;
        this.monitorConfig = {
            port: monitorConfig.port ?? 3110,
            host: monitorConfig.host ?? '127.0.0.1',
            apiKey: monitorConfig.apiKey,
            corsOrigins: monitorConfig.corsOrigins ?? ['*']
        };

        this.app = express();
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupMiddleware();
        this.setupRoutes();
        this.setupWebSocket();
        this.setupEventForwarding();
    }

    private setupMiddleware() {
        this.app.disable('x-powered-by');
        this.app.use(cors({ origin: this.monitorConfig.corsOrigins }));
        this.app.use(express.json({ limit: '16kb' }));

        // API key authentication (if configured)
        this.app.use('/api', (req: Request, res: Response, next: NextFunction) => {
            const apiKey = this.monitorConfig.apiKey;
            if (!apiKey) return next();

            const authHeader = (req.headers['authorization'] || '').toString();
            const bearer = authHeader.startsWith('Bearer ') ? authHeader.slice(7).trim() : '';
            const providedKey = req.headers['x-api-key'] || bearer;
            if (providedKey !== apiKey) {
                res.status(401).json({ error: 'Invalid or missing API key' });
                return;
            }
            next();
        });

        this.app.use((req: Request, _res: Response, next: NextFunction) => {
            logger.debug(`Monitor: ${req.method} ${req.path}`);
            next();
        });
    }

    private setupRoutes() {
        const { gateway, connections, coordinator, activity } = this.deps;

        this.app.get('/api/status', (_req: Request, res: Response) => {
            res.json(this.getStatus());
        });

        this.app.get('/api/history', (_req: Request, res: Response) => {
            const transport = connections.getTransport();
            res.json({
                activity: activity.getHistory(),
                wire: transport instanceof VirtualTransport ? transport.getHistory() : []
            });
        });

        this.app.post('/api/command', async (req: Request, res: Response) => {
            const body = CommandBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ error: 'Body must be { "char": <one character> }' });
                return;
            }

            const entry = decode(body.data.char);
            if (!entry) {
                res.status(400).json({ error: `Unknown command character '${body.data.char}'` });
                return;
            }

            const result = entry.group === null
                ? await gateway.emergencyStop('remote')
                : await gateway.submit({
                    producer: 'remote',
                    target: entry.group,
                    action: entry.action,
                    durationMs: body.data.durationMs
                });
            this.sendResult(res, result);
        });

        this.app.post('/api/stop', async (_req: Request, res: Response) => {
            this.sendResult(res, await gateway.submit({ producer: 'remote', action: Action.EmergencyStop }));
        });

        this.app.post('/api/mode', async (req: Request, res: Response) => {
            const body = ModeBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ error: 'Body must be { "mode": "keyboard" | "voice" | "gesture" }' });
                return;
            }
            const switched = await coordinator.setMode(body.data.mode);
            res.status(switched ? 200 : 409).json({ mode: coordinator.mode, switched });
        });

        this.app.post('/api/reconnect', async (_req: Request, res: Response) => {
            try {
                await connections.reconnect();
                res.json({ connection: connections.state() });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                res.status(502).json({ error: message, connection: connections.state() });
            }
        });
    }

    private sendResult(res: Response, result: SubmitResult) {
        if (result.ok) {
            res.json({ ok: true, outcome: result.outcome, written: result.written });
            return;
        }
        const status = result.error.code === 'InvalidRequest' ? 400 : 409;
        res.status(status).json({ ok: false, code: result.error.code, error: result.error.message, written: result.written });
    }

    private setupWebSocket() {
        this.wss.on('connection', (ws: WebSocket, req) => {
            if (this.monitorConfig.apiKey) {
                const requestUrl = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
                if (requestUrl.searchParams.get('apiKey') !== this.monitorConfig.apiKey) {
                    ws.close(1008, 'Unauthorized');
                    return;
                }
            }

            logger.info(`Monitor: WebSocket client connected from ${req.socket.remoteAddress}`);
            this.clients.add(ws);

            ws.send(JSON.stringify({ type: 'status', data: this.getStatus() }));

            ws.on('close', () => {
                this.clients.delete(ws);
                logger.debug('Monitor: WebSocket client disconnected');
            });

            ws.on('error', (error) => {
                logger.error(`Monitor WebSocket error: ${error}`);
                this.clients.delete(ws);
            });
        });
    }

    private setupEventForwarding() {
        this.forward('command:accepted');
        this.forward('command:rejected');
        this.forward('command:failed');
        this.forward('recognition:decision');
        this.forward('connection:state');
        this.forward('mode:changed');
        this.forward('virtual:byte');
        this.forward('transport:closed');
        this.forward('gateway:faulted', ({ error }) => ({ kind: error.kind, message: error.message }));
    }

    private forward<K extends BusEventName>(event: K, toData: (payload: BusEvents[K]) => unknown = payload => payload) {
        const listener = (payload: BusEvents[K]) => {
            this.broadcast({ type: 'event', event, data: toData(payload), timestamp: new Date().toISOString() });
        };
        this.bus.on(event, listener);
        this.unsubscribers.push(() => this.bus.off(event, listener));
    }

    private broadcast(message: unknown) {
        const payload = JSON.stringify(message);
        this.clients.forEach(client => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(payload);
            }
        });
    }

    public getStatus() {
        const { gateway, connections, coordinator } = this.deps;
        return {
            connection: connections.state(),
            connected: gateway.isConnected(),
            faulted: gateway.isFaulted(),
            stale: gateway.isStale(),
            mode: coordinator.mode,
            actuators: gateway.snapshot()
        };
    }

    /** Bound address once started; useful when listening on port 0. */
    public address(): AddressInfo | null {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address : null;
    }

    public async start(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.monitorConfig.port, this.monitorConfig.host, () => {
                this.server.off('error', reject);
                const port = this.address()?.port ?? this.monitorConfig.port;
                logger.info(`Monitor server running at http://${this.monitorConfig.host}:${port}`);
                resolve();
            });
        });
    }

    public async stop(): Promise<void> {
        this.unsubscribers.forEach(unsubscribe => unsubscribe());
        this.unsubscribers = [];
        this.clients.forEach(client => client.terminate());
        this.clients.clear();
        await new Promise<void>(resolve => this.wss.close(() => resolve()));
        if (this.server.listening) {
            const closed = new Promise<void>((resolve, reject) => {
                this.server.close(error => (error ? reject(error) : resolve()));
            });
            this.server.closeAllConnections();
            await closed;
        }
        logger.info('Monitor server stopped');
    }
}
