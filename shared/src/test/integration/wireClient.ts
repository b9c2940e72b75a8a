/**
 * WireClient - speaks the device connection layer and sync sub-protocol over a real socket.
 *
 * Plays the part of the host-side server when talking to an emulator in tests:
 * send a CNXN, read the device greeting, OPEN services, and run sync requests.
 */

import * as net from 'net';
import {
    decodeHeader,
    decodeSyncHeader,
    encodePacket,
    encodeSyncHeader,
    AdbCommand,
    HEADER_SIZE,
    SYNC_HEADER_SIZE,
    SyncOperation,
} from '../../protocol';
import type { PacketHeader, SyncHeader } from '../../protocol';

export interface WireClientOpts {
    host?: string;      // Default: 127.0.0.1
    port: number;
}

export interface ReceivedPacket {
    header: PacketHeader;
    payload: Buffer;
}

export class WireClient {
    private buffer: Buffer = Buffer.alloc(0);
    private waiter: (() => void) | null = null;
    private ended = false;
    private readonly closedPromise: Promise<void>;

    private constructor(private readonly socket: net.Socket) {
        socket.on('data', (data: Buffer) => {
            this.buffer = Buffer.concat([this.buffer, data]);
            this.waiter?.();
        });
        this.closedPromise = new Promise((resolve) => {
            socket.once('close', () => {
                this.ended = true;
                this.waiter?.();
                resolve();
            });
        });
        socket.on('end', () => {
            this.ended = true;
            this.waiter?.();
        });
        socket.on('error', () => {
            // 'close' follows and ends pending reads
        });
    }

    static connect(opts: WireClientOpts): Promise<WireClient> {
        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host: opts.host ?? '127.0.0.1', port: opts.port });
            socket.once('error', reject);
            socket.once('connect', () => {
                socket.removeListener('error', reject);
                resolve(new WireClient(socket));
            });
        });
    }

    write(data: Buffer): Promise<void> {
        return new Promise((resolve, reject) => {
            this.socket.write(data, (err) => (err ? reject(err) : resolve()));
        });
    }

    /**
     * Read exactly `count` bytes; rejects if the connection ends first.
     */
    readExactly(count: number): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            const attempt = () => {
                if (this.buffer.length >= count) {
                    this.waiter = null;
                    const out = this.buffer.subarray(0, count);
                    this.buffer = this.buffer.subarray(count);
                    resolve(out);
                } else if (this.ended) {
                    this.waiter = null;
                    reject(new Error(`Connection closed after ${this.buffer.length} of ${count} bytes`));
                } else {
                    this.waiter = attempt;
                }
            };
            attempt();
        });
    }

    async readPacket(): Promise<ReceivedPacket> {
        const header = decodeHeader(await this.readExactly(HEADER_SIZE));
        const payload = header.dataLength > 0 ? await this.readExactly(header.dataLength) : Buffer.alloc(0);
        return { header, payload };
    }

    async readSyncHeader(): Promise<SyncHeader> {
        return decodeSyncHeader(await this.readExactly(SYNC_HEADER_SIZE));
    }

    /**
     * Send our CNXN and return the device's greeting.
     */
    async handshake(): Promise<ReceivedPacket> {
        await this.write(encodePacket(AdbCommand.CNXN, 0x01000001, 256 * 1024, Buffer.from('host::\0', 'utf-8')));
        return this.readPacket();
    }

    /**
     * OPEN a service with a NUL-terminated destination and return the reply.
     */
    async open(localId: number, destination: string): Promise<ReceivedPacket> {
        await this.write(encodePacket(AdbCommand.OPEN, localId, 0, Buffer.from(`${destination}\0`, 'utf-8')));
        return this.readPacket();
    }

    async sendSyncRequest(operation: SyncOperation, path: string): Promise<void> {
        const pathBytes = Buffer.from(path, 'utf-8');
        await this.write(Buffer.concat([encodeSyncHeader(operation, pathBytes.length), pathBytes]));
    }

    /**
     * Push `content` with SEND and return the acknowledgement header.
     */
    async push(remotePath: string, mode: number, content: Buffer): Promise<SyncHeader> {
        await this.sendSyncRequest(SyncOperation.SEND, `${remotePath},${mode}`);
        await this.write(Buffer.concat([encodeSyncHeader(SyncOperation.DATA, content.length), content]));
        await this.write(encodeSyncHeader(SyncOperation.DONE, 0));
        return this.readSyncHeader();
    }

    /**
     * Pull a file with RECV and return the concatenated DATA payloads.
     */
    async pull(remotePath: string): Promise<Buffer> {
        await this.sendSyncRequest(SyncOperation.RECV, remotePath);
        const chunks: Buffer[] = [];
        for (;;) {
            const frame = await this.readSyncHeader();
            if (frame.id === SyncOperation.DONE) {
                return Buffer.concat(chunks);
            }
            if (frame.id !== SyncOperation.DATA) {
                throw new Error(`Unexpected sync frame 0x${frame.id.toString(16)}`);
            }
            chunks.push(await this.readExactly(frame.length));
        }
    }

    /** Resolves once the socket has fully closed */
    closed(): Promise<void> {
        return this.closedPromise;
    }

    /** Bytes received but not yet read */
    pendingBytes(): number {
        return this.buffer.length;
    }

    end(): void {
        this.socket.end();
    }

    destroy(): void {
        this.socket.destroy();
    }
}
