import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import * as http from 'http';
import { Coordinator, FileEvent, RejectedRequest } from '../core/coordinator';
import { log } from '../core/log';
import { Session } from '../core/registry';

interface DashboardEvent {
    type: string;
    payload: unknown;
    timestamp: number;
}

const HISTORY_LIMIT = 100;

/**
 * Read-only view of a coordinator: REST snapshots of sessions and the file index
 * plus a WebSocket feed of coordinator events. Nothing here mutates state.
 */
export class WebDashboard {
    private app = express();
    private server: http.Server;
    private wss: WebSocketServer;
    private clients: Set<WebSocket> = new Set();
    private history: DashboardEvent[] = [];
    private readonly startedAt = Date.now();

    constructor(private coordinator: Coordinator, private port: number, private host = '127.0.0.1') {
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupExpress();
        this.setupWebSocket();
        this.hookCoordinatorEvents();
    }

    public async start(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.port, this.host, () => {
                this.server.off('error', reject);
                const address = this.server.address();
                const port = address && typeof address === 'object' ? address.port : this.port;
                log.success('WEB UI', `Dashboard running at http://${this.host}:${port}`);
                resolve(port);
            });
        });
    }

    public async stop(): Promise<void> {
        for (const client of this.clients) client.terminate();
        this.wss.close();
        const closed = new Promise<void>((resolve) => this.server.close(() => resolve()));
        this.server.closeAllConnections();
        return closed;
    }

    private setupExpress() {
        this.app.use(cors());

        this.app.get('/api/info', (_req, res) => {
            res.json({
                sessions: this.coordinator.registry.getSessions().length,
                files: this.coordinator.registry.getFiles().length,
                uptimeMs: Date.now() - this.startedAt,
            });
        });

        this.app.get('/api/sessions', (_req, res) => {
            res.json(this.coordinator.registry.getSessions().map(s => ({
                username: s.username,
                address: s.endpoint.address,
                transferPort: s.transferPort,
                lastHeartbeat: s.lastHeartbeat,
            })));
        });

        this.app.get('/api/files', (_req, res) => {
            res.json(this.coordinator.registry.getFiles());
        });
    }

    private setupWebSocket() {
        this.wss.on('connection', (ws) => {
            this.clients.add(ws);
            ws.send(JSON.stringify({ type: 'INIT', history: this.history }));
            ws.on('close', () => this.clients.delete(ws));
            ws.on('error', (err) => log.debug('WEB UI', `WebSocket client error: ${err.message}`));
        });
    }

    private broadcast(type: string, payload: unknown) {
        const event: DashboardEvent = { type, payload, timestamp: Date.now() };
        this.history.push(event);
        if (this.history.length > HISTORY_LIMIT) this.history.shift();

        const msg = JSON.stringify(event);
        for (const client of this.clients) {
            if (client.readyState === WebSocket.OPEN) {
                client.send(msg);
            }
        }
    }

    private hookCoordinatorEvents() {
        const sessionView = (s: Session) => ({ username: s.username, address: s.endpoint.address, transferPort: s.transferPort });

        this.coordinator.on('session:new', (s: Session) => this.broadcast('SESSION_NEW', sessionView(s)));
        this.coordinator.on('session:expired', (s: Session) => this.broadcast('SESSION_EXPIRED', sessionView(s)));
        this.coordinator.on('file:shared', (e: FileEvent) => this.broadcast('FILE_SHARED', e));
        this.coordinator.on('file:removed', (e: FileEvent) => this.broadcast('FILE_REMOVED', e));
        this.coordinator.on('request:rejected', (r: RejectedRequest) => this.broadcast('REQUEST_REJECTED', r));
    }
}
