/**
 * Device Emulator Service
 *
 * Listens on a loopback TCP port and behaves like a minimal device daemon:
 * greets every connection with CNXN, records and acknowledges every OPEN,
 * and answers the sync sub-protocol (SEND / RECV / QUIT) on "sync:" streams.
 *
 * Each accepted socket gets a ConnectionSessionManager keyed by a fresh UUID.
 * All sockets are serviced from the one Node event loop; a sync transfer on one
 * connection never holds up another.
 */

import * as net from 'net';
import { v4 as uuidv4 } from 'uuid';
import { log, RecordLog, DEVICE_BANNER } from '@device-emu/shared';
import type { AddressFamily, IServer, IServerFactory, LogConfig, SyncRecord } from '@device-emu/shared';
import { ConnectionSessionManager, type ConnectionSessionConfig } from './connectionSession';

/** Content returned for every sync RECV */
export const DEFAULT_SYNC_PAYLOAD = 'hello from emulated device';

export interface DeviceEmulatorConfig extends LogConfig {
    /** Port to bind; 0 or absent picks an ephemeral port */
    port?: number;
    /** Send CNXN as soon as a connection is accepted instead of after the peer's first bytes */
    greetOnAccept?: boolean;
    banner?: string;
    syncPayload?: string | Buffer;
}

export interface DeviceEmulatorDeps {
    serverFactory?: IServerFactory;
}

/**
 * What start() hands back: the bound port and the two record logs.
 */
export interface EmulatorHandle {
    port: number;
    commandLog: RecordLog<string>;
    syncLog: RecordLog<SyncRecord>;
}

function loopbackHost(family: AddressFamily): string {
    return family === 6 ? '::1' : '127.0.0.1';
}

/**
 * DeviceEmulator - recording stand-in for a device daemon
 *
 * @example
 * ```typescript
 * const emulator = new DeviceEmulator({ logCallback: (msg) => console.log(msg) });
 * const { port, commandLog } = await emulator.start(4);
 *
 * // point a client at 127.0.0.1:<port>, then
 * console.log(commandLog.snapshot());
 * await emulator.stop();
 * ```
 *
 * **Session Management:**
 * - Sessions stored in Map<string, ConnectionSessionManager> keyed by UUID
 * - A session removes itself from the Map once its cleanup finishes (any exit path)
 * - stop() requests cleanup of every live session, then waits for the listener to close
 */
export class DeviceEmulator {
    readonly commandLog = new RecordLog<string>();
    readonly syncLog = new RecordLog<SyncRecord>();

    private readonly config: DeviceEmulatorConfig;
    private readonly serverFactory: IServerFactory;
    private sessions: Map<string, ConnectionSessionManager> = new Map();
    private server: IServer | null = null;
    private port: number | null = null;

    constructor(config: DeviceEmulatorConfig = {}, deps?: DeviceEmulatorDeps) {
        this.config = config;
        this.serverFactory = deps?.serverFactory ?? { createServer: net.createServer };
    }

    /** Port this emulator is listening on, or null if not started */
    getPort(): number | null { return this.port; }

    /** True if the server is currently running */
    isRunning(): boolean { return this.server !== null; }

    /** Number of open connections */
    getConnectionCount(): number { return this.sessions.size; }

    /**
     * Bind a loopback port of the given family and start accepting connections.
     *
     * Resolves once the listener is accepting, so a client may connect immediately.
     * Rejects if the port cannot be bound or the emulator is already running.
     */
    async start(family: AddressFamily = 4): Promise<EmulatorHandle> {
        if (this.server) {
            throw new Error('Device emulator is already running');
        }

        const syncPayload = this.config.syncPayload ?? DEFAULT_SYNC_PAYLOAD;
        const sessionConfig: ConnectionSessionConfig = {
            logCallback: this.config.logCallback,
            banner: this.config.banner ?? DEVICE_BANNER,
            syncPayload: typeof syncPayload === 'string' ? Buffer.from(syncPayload, 'utf-8') : syncPayload,
            greetOnAccept: this.config.greetOnAccept ?? false,
            commandLog: this.commandLog,
            syncLog: this.syncLog,
        };

        const server = this.serverFactory.createServer({ pauseOnConnect: true }, (clientSocket) => {
            const sessionId = uuidv4();
            const session = new ConnectionSessionManager(sessionConfig, clientSocket, sessionId);
            this.sessions.set(sessionId, session);

            // event sequences:
            // - peer closed: 'end' -> 'close'
            // - reset or other OS error: 'error' -> 'close'
            clientSocket.once('close', (hadError: boolean) => {
                log(this.config, `[${sessionId}] Client socket closed (hadError=${hadError})`);
                if (hadError) {
                    session.emit('ERROR_OCCURRED', 'Socket closed with transmission error');
                } else {
                    session.emit('CLEANUP_REQUESTED', false);
                }
            });

            clientSocket.once('error', (err: Error) => {
                log(this.config, `[${sessionId}] Client socket error: ${err.message}`);
            });

            clientSocket.on('readable', () => {
                let chunk: Buffer | null;
                while ((chunk = clientSocket.read()) !== null) {
                    session.handleIncomingData(chunk);
                }
            });

            session.once('CLEANUP_COMPLETE', () => this.sessions.delete(sessionId));
            session.once('CLEANUP_ERROR', () => this.sessions.delete(sessionId));

            session.start();
        });

        const host = loopbackHost(family);
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen({ host, port: this.config.port ?? 0 }, () => {
                server.removeListener('error', reject);
                resolve();
            });
        });

        server.on('error', (err: Error) => {
            log(this.config, `Emulator server error: ${err.message}`);
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
            server.close();
            throw new Error(`Device emulator bound to an unexpected address: ${address}`);
        }

        this.server = server;
        this.port = address.port;
        log(this.config, `Device emulator listening on ${host}:${address.port}`);

        return { port: address.port, commandLog: this.commandLog, syncLog: this.syncLog };
    }

    /**
     * Stop the emulator.
     *
     * Cleans up every connection, closes the listener and resolves once the port is
     * released. Calling it when not running is a no-op.
     */
    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = null;

        return new Promise((stopResolve) => {
            // server.close() only calls back once every connection is gone
            server.close((err?: Error) => {
                if (err) {
                    log(this.config, `Emulator server close reported: ${err.message}`);
                }
                log(this.config, 'Device emulator stopped');
                this.port = null;
                stopResolve();
            });

            for (const session of [...this.sessions.values()]) {
                session.emit('CLEANUP_REQUESTED', false);
            }
        });
    }
}

/**
 * Create and start a DeviceEmulator in one call.
 */
export async function startDeviceEmulator(
    config: DeviceEmulatorConfig = {},
    family: AddressFamily = 4,
    deps?: DeviceEmulatorDeps
): Promise<DeviceEmulator> {
    const emulator = new DeviceEmulator(config, deps);
    await emulator.start(family);
    return emulator;
}
