/**
 * Shared type definitions and dependency injection interfaces.
 * These types are used by the emulator, the host request recorder and their tests.
 */

import * as net from 'net';

/**
 * Configuration for logging callbacks.
 * Implemented by DeviceEmulatorConfig and HostRequestRecorderConfig.
 */
export interface LogConfig {
    /**
     * Optional callback for logging messages.
     * Called instead of console.log so the caller decides where lines go.
     */
    logCallback?: (message: string) => void;
}

/**
 * Abstraction for creating TCP sockets.
 * Allows injection of mock implementations for testing.
 */
export interface ISocketFactory {
    /**
     * Create a TCP connection to a remote host.
     */
    createConnection(
        options: { host: string; port: number; allowHalfOpen?: boolean },
        connectionListener?: () => void
    ): net.Socket;
}

/**
 * The part of net.Socket a per-connection state machine uses.
 * net.Socket satisfies it structurally; MockSocket implements it for tests.
 */
export interface IClientSocket {
    readonly destroyed: boolean;
    write(data: Buffer, callback?: (err?: Error | null) => void): boolean;
    read(): Buffer | null;
    resume(): unknown;
    destroy(): unknown;
    removeAllListeners(): unknown;
    on(event: 'readable', listener: () => void): unknown;
    once(event: 'close', listener: (hadError: boolean) => void): unknown;
    once(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * The part of net.Server the emulator uses.
 */
export interface IServer {
    listen(options: net.ListenOptions, listeningListener?: () => void): unknown;
    address(): net.AddressInfo | string | null;
    close(callback?: (err?: Error) => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
    once(event: 'error', listener: (err: Error) => void): unknown;
    removeListener(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Abstraction for creating TCP servers.
 * Allows injection of mock implementations for testing.
 * TSocket is the socket surface the listener needs; net.createServer satisfies every choice.
 */
export interface IServerFactory<TSocket = IClientSocket> {
    createServer(
        options: net.ServerOpts,
        connectionListener: (socket: TSocket) => void
    ): IServer;
}

/**
 * Minimal surface a per-connection state machine exposes to its owner.
 */
export interface ISessionManager {
    readonly sessionId: string;
    readonly socket: IClientSocket;
}

/**
 * IP family of the loopback address the emulator binds.
 */
export type AddressFamily = 4 | 6;

/**
 * One request recorded by the sync sub-protocol handler.
 * `target` and `mode` are only present for SEND, whose path argument is "<path>,<mode>".
 */
export interface SyncRecord {
    operation: number;
    path: string;
    target?: string;
    mode?: number;
}

/**
 * One chunk relayed by the host request recorder.
 */
export interface TrafficRecord {
    direction: 'fromClient' | 'fromServer';
    data: Buffer;
}
