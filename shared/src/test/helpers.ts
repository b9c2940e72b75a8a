/**
 * Test Mock Helpers
 *
 * Mock implementations of the socket and server interfaces for unit testing.
 * Allows the emulator's state machines to be driven without real sockets.
 */

import { EventEmitter } from 'events';
import type * as net from 'net';
import type { IClientSocket, IServer, IServerFactory } from '../types';

/**
 * Mock Socket - emulates the net.Socket surface used by connection sessions
 */
export class MockSocket extends EventEmitter implements IClientSocket {
    public data: Buffer[] = [];
    public destroyed = false;
    public resumed = false;
    public writeError: Error | null = null;
    public removeAllListenersError: Error | null = null;
    public destroyError: Error | null = null;
    private readBuffer: Buffer[] = [];

    write(data: Buffer, callback?: (err?: Error | null) => void): boolean {
        if (this.destroyed) {
            if (callback) {
                setImmediate(() => callback(new Error('Socket is destroyed')));
            }
            return false;
        }

        this.data.push(data);

        if (this.writeError) {
            const err = this.writeError;
            this.writeError = null;
            if (callback) {
                setImmediate(() => callback(err));
            }
            return false;
        }

        if (callback) {
            setImmediate(() => callback(null));
        }
        return true;
    }

    read(): Buffer | null {
        return this.readBuffer.shift() ?? null;
    }

    resume(): this {
        this.resumed = true;
        return this;
    }

    removeAllListeners(event?: string | symbol): this {
        if (this.removeAllListenersError) {
            const err = this.removeAllListenersError;
            this.removeAllListenersError = null;
            throw err;
        }
        return super.removeAllListeners(event);
    }

    destroy(error?: Error): this {
        if (this.destroyError) {
            const err = this.destroyError;
            this.destroyError = null;
            throw err;
        }

        this.destroyed = true;
        const hadError = !!error;
        if (error) {
            this.emit('error', error);
        }
        this.emit('close', hadError);
        return this;
    }

    /** Peer closed its side gracefully */
    end(): void {
        this.emit('end');
        this.emit('close', false);
    }

    // Test helper methods
    simulateDataReceived(data: Buffer): void {
        this.readBuffer.push(data);
        this.emit('readable');
    }

    simulateError(error: Error): void {
        this.emit('error', error);
        this.emit('close', true);
    }

    setWriteError(error: Error): void {
        this.writeError = error;
    }

    setRemoveAllListenersError(error: Error): void {
        this.removeAllListenersError = error;
    }

    setDestroyError(error: Error): void {
        this.destroyError = error;
    }
}

/**
 * Mock Server - emulates net.Server
 */
export class MockServer extends EventEmitter implements IServer {
    public listening = false;
    public listenOptions: net.ListenOptions | null = null;
    public listenError: Error | null = null;
    public options: net.ServerOpts;
    private clientHandler: (socket: IClientSocket) => void;
    private boundPort = 0;
    private static nextPort = 40000;

    constructor(options: net.ServerOpts, clientHandler: (socket: IClientSocket) => void) {
        super();
        this.options = options;
        this.clientHandler = clientHandler;
    }

    listen(options: net.ListenOptions, callback?: () => void): this {
        if (this.listenError) {
            const err = this.listenError;
            setImmediate(() => this.emit('error', err));
            return this;
        }
        this.listenOptions = options;
        this.listening = true;
        this.boundPort = options.port || MockServer.nextPort++;
        if (callback) {
            setImmediate(callback);
        }
        return this;
    }

    address(): net.AddressInfo | null {
        if (!this.listening) {
            return null;
        }
        const host = this.listenOptions?.host ?? '127.0.0.1';
        return { address: host, family: host.includes(':') ? 'IPv6' : 'IPv4', port: this.boundPort };
    }

    close(callback?: (err?: Error) => void): this {
        this.listening = false;
        if (callback) {
            callback();
        }
        return this;
    }

    // Test helper methods
    simulateClientConnection(): MockSocket {
        const socket = new MockSocket();
        this.clientHandler(socket);
        return socket;
    }
}

/**
 * Mock ServerFactory - creates mock servers
 */
export class MockServerFactory implements IServerFactory {
    public servers: MockServer[] = [];
    public nextListenError: Error | null = null;

    createServer(options: net.ServerOpts, clientHandler: (socket: IClientSocket) => void): MockServer {
        const server = new MockServer(options, clientHandler);
        if (this.nextListenError) {
            server.listenError = this.nextListenError;
            this.nextListenError = null;
        }
        this.servers.push(server);
        return server;
    }

    getLastServer(): MockServer {
        const server = this.servers[this.servers.length - 1];
        if (!server) {
            throw new Error('No server has been created');
        }
        return server;
    }

    setListenError(error: Error): void {
        this.nextListenError = error;
    }
}

/**
 * Log helper for tests
 */
export class MockLogConfig {
    public logs: string[] = [];

    logCallback = (message: string) => {
        this.logs.push(message);
    };

    getLogs(): string[] {
        return this.logs;
    }

    hasLog(pattern: string | RegExp): boolean {
        const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
        return this.logs.some((log) => regex.test(log));
    }
}

/**
 * Let pending setImmediate callbacks (mock write completions) run.
 */
export function flushImmediates(rounds = 2): Promise<void> {
    let chain = Promise.resolve();
    for (let i = 0; i < rounds; i++) {
        chain = chain.then(() => new Promise<void>((resolve) => setImmediate(resolve)));
    }
    return chain;
}
