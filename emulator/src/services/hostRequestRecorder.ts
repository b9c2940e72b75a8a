/**
 * Host Request Recorder
 *
 * Recording relay placed between a client and its upstream server.
 * For every accepted connection it opens an upstream socket, records the first
 * length-prefixed host request ("000chost:version" → "host:version") and then
 * forwards bytes verbatim in both directions. With captureTraffic set, every
 * relayed chunk is also recorded with its direction.
 */

import * as net from 'net';
import { v4 as uuidv4 } from 'uuid';
import { log, cleanupSocket, RecordLog } from '@device-emu/shared';
import type { IServer, IServerFactory, ISocketFactory, LogConfig, TrafficRecord } from '@device-emu/shared';

/** Host requests start with their payload length as four hex digits */
const LENGTH_PREFIX_SIZE = 4;

export interface HostRequestRecorderConfig extends LogConfig {
    upstreamHost?: string;      // Default: 127.0.0.1
    upstreamPort: number;
    port?: number;              // Default: ephemeral
    captureTraffic?: boolean;
}

export interface HostRequestRecorderDeps {
    serverFactory?: IServerFactory<net.Socket>;
    socketFactory?: ISocketFactory;
}

export interface RecorderHandle {
    port: number;
    requests: RecordLog<string>;
    traffic: RecordLog<TrafficRecord>;
}

interface Relay {
    client: net.Socket;
    upstream: net.Socket;
}

export type HostRequestParse =
    | { kind: 'request'; request: string }
    | { kind: 'incomplete' }
    | { kind: 'malformed'; prefix: string };

/**
 * Parse the first host request from the bytes received so far.
 */
export function parseHostRequest(data: Buffer): HostRequestParse {
    if (data.length < LENGTH_PREFIX_SIZE) {
        return { kind: 'incomplete' };
    }
    const prefix = data.toString('latin1', 0, LENGTH_PREFIX_SIZE);
    if (!/^[0-9a-fA-F]{4}$/.test(prefix)) {
        return { kind: 'malformed', prefix };
    }
    const length = parseInt(prefix, 16);
    if (data.length < LENGTH_PREFIX_SIZE + length) {
        return { kind: 'incomplete' };
    }
    return { kind: 'request', request: data.toString('utf-8', LENGTH_PREFIX_SIZE, LENGTH_PREFIX_SIZE + length) };
}

export class HostRequestRecorder {
    readonly requests = new RecordLog<string>();
    readonly traffic = new RecordLog<TrafficRecord>();

    private readonly config: HostRequestRecorderConfig;
    private readonly serverFactory: IServerFactory<net.Socket>;
    private readonly socketFactory: ISocketFactory;
    private relays: Map<string, Relay> = new Map();
    private server: IServer | null = null;

    constructor(config: HostRequestRecorderConfig, deps?: HostRequestRecorderDeps) {
        this.config = config;
        this.serverFactory = deps?.serverFactory ?? { createServer: net.createServer };
        this.socketFactory = deps?.socketFactory ?? { createConnection: net.createConnection };
    }

    /** Number of relays with at least one side still open */
    getRelayCount(): number { return this.relays.size; }

    async start(): Promise<RecorderHandle> {
        if (this.server) {
            throw new Error('Host request recorder is already running');
        }

        // Both sides stay half-open so a reply sent after the client's FIN still reaches it
        const server = this.serverFactory.createServer({ allowHalfOpen: true }, (client) => this.handleClient(client));

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen({ host: '127.0.0.1', port: this.config.port ?? 0 }, () => {
                server.removeListener('error', reject);
                resolve();
            });
        });

        server.on('error', (err: Error) => {
            log(this.config, `Recorder server error: ${err.message}`);
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
            server.close();
            throw new Error(`Host request recorder bound to an unexpected address: ${address}`);
        }

        this.server = server;
        log(this.config, `Host request recorder listening on 127.0.0.1:${address.port}, upstream port ${this.config.upstreamPort}`);
        return { port: address.port, requests: this.requests, traffic: this.traffic };
    }

    /**
     * Destroy every relay and close the listener.
     */
    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = null;

        for (const [relayId, relay] of this.relays) {
            cleanupSocket(relay.client, this.config, relayId);
            cleanupSocket(relay.upstream, this.config, relayId);
        }
        this.relays.clear();

        return new Promise((stopResolve) => {
            server.close(() => {
                log(this.config, 'Host request recorder stopped');
                stopResolve();
            });
        });
    }

    private handleClient(client: net.Socket): void {
        const relayId = uuidv4();
        const upstream = this.socketFactory.createConnection({
            host: this.config.upstreamHost ?? '127.0.0.1',
            port: this.config.upstreamPort,
            allowHalfOpen: true,
        });
        this.relays.set(relayId, { client, upstream });
        log(this.config, `[${relayId}] Client connected, relaying to upstream`);

        let pending: Buffer | null = Buffer.alloc(0);
        let openSides = 2;

        const forward = (to: net.Socket, direction: TrafficRecord['direction'], data: Buffer) => {
            if (this.config.captureTraffic) {
                this.traffic.append({ direction, data: Buffer.from(data) });
            }
            to.write(data);
        };

        const abort = (reason: string) => {
            log(this.config, `[${relayId}] ${reason}`);
            client.destroy();
            upstream.destroy();
        };

        client.on('data', (data: Buffer) => {
            if (pending === null) {
                forward(upstream, 'fromClient', data);
                return;
            }
            pending = Buffer.concat([pending, data]);
            const parsed = parseHostRequest(pending);
            if (parsed.kind === 'incomplete') {
                return;
            }
            if (parsed.kind === 'malformed') {
                abort(`Malformed host request prefix: ${JSON.stringify(parsed.prefix)}`);
                return;
            }
            this.requests.append(parsed.request);
            log(this.config, `[${relayId}] Host request: ${parsed.request}`);
            const buffered = pending;
            pending = null;
            forward(upstream, 'fromClient', buffered);
        });

        upstream.on('data', (data: Buffer) => {
            forward(client, 'fromServer', data);
        });

        // Graceful close on one side half-closes the other so queued bytes still flush
        client.once('end', () => {
            log(this.config, `[${relayId}] Client disconnected`);
            upstream.end();
        });
        upstream.once('end', () => {
            log(this.config, `[${relayId}] Upstream disconnected`);
            client.end();
        });

        client.on('error', (err: Error) => abort(`Client error: ${err.message}`));
        upstream.on('error', (err: Error) => abort(`Upstream error: ${err.message}`));

        const onClose = () => {
            openSides -= 1;
            if (openSides === 0) {
                this.relays.delete(relayId);
                log(this.config, `[${relayId}] Relay closed`);
            }
        };
        client.once('close', onClose);
        upstream.once('close', onClose);
    }
}
