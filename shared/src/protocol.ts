/**
 * Shared protocol utilities for the device connection layer and its sync sub-protocol.
 *
 * Key principle: every header field is an unsigned 32-bit little-endian integer.
 * Four-character command tags are kept as typed enumerations and converted to and from
 * their ASCII form only through tagToId()/idToTag().
 */

import type { IClientSocket, LogConfig } from './types';

/** Size of a connection-layer message header */
export const HEADER_SIZE = 24;

/** Size of a sync request or data frame header */
export const SYNC_HEADER_SIZE = 8;

/** Protocol version announced in the connect greeting */
export const PROTOCOL_VERSION = 0x01000001;

/** Maximum payload announced in the connect greeting */
export const MAX_PAYLOAD = 4096;

/** Banner sent as the connect greeting payload */
export const DEVICE_BANNER = 'device::';

/** Destination of an OPEN that starts the file-transfer sub-protocol */
export const SYNC_SERVICE = 'sync:';

/**
 * Connection-layer commands.
 * Each value is the four ASCII bytes of its name read as a little-endian u32.
 */
export enum AdbCommand {
    CNXN = 0x4e584e43,
    OPEN = 0x4e45504f,
    OKAY = 0x59414b4f,
    CLSE = 0x45534c43,
    WRTE = 0x45545257,
    AUTH = 0x48545541,
}

/**
 * Sync sub-protocol request and data-frame ids, encoded the same way as AdbCommand.
 */
export enum SyncOperation {
    SEND = 0x444e4553,
    RECV = 0x56434552,
    QUIT = 0x54495551,
    DATA = 0x41544144,
    DONE = 0x454e4f44,
    OKAY = 0x59414b4f,
    FAIL = 0x4c494146,
    STAT = 0x54415453,
    LIST = 0x5453494c,
}

/**
 * Convert a four-character ASCII tag to its little-endian u32 id.
 *
 * @throws RangeError if the tag is not exactly four ASCII characters
 */
export function tagToId(tag: string): number {
    const bytes = Buffer.from(tag, 'latin1');
    if (tag.length !== 4 || bytes.length !== 4 || !/^[\x20-\x7e]{4}$/.test(tag)) {
        throw new RangeError(`Invalid command tag: ${JSON.stringify(tag)}`);
    }
    return bytes.readUInt32LE(0);
}

/**
 * Convert a u32 id back to its four-character ASCII tag.
 * Ids whose bytes are not printable ASCII are rendered as 0x-prefixed hex.
 */
export function idToTag(id: number): string {
    const bytes = Buffer.alloc(4);
    bytes.writeUInt32LE(id >>> 0, 0);
    const tag = bytes.toString('latin1');
    return /^[\x20-\x7e]{4}$/.test(tag) ? tag : `0x${(id >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * Checksum the emulator writes in the last header field.
 */
export function headerChecksum(command: number): number {
    return (command ^ 0xffffffff) >>> 0;
}

/**
 * Decoded connection-layer header. `checksum` is reported, never validated.
 */
export interface PacketHeader {
    command: number;
    arg0: number;
    arg1: number;
    dataLength: number;
    checksum: number;
}

/**
 * Serialize a connection-layer message: six little-endian u32 fields followed by the payload.
 *
 * @param command Command id (see AdbCommand)
 * @param arg0 First argument
 * @param arg1 Second argument
 * @param payload Message payload; its length becomes data_length
 * @returns Header and payload in one Buffer
 */
export function encodePacket(command: number, arg0: number, arg1: number, payload: Buffer = Buffer.alloc(0)): Buffer {
    const header = Buffer.alloc(HEADER_SIZE);
    header.writeUInt32LE(command >>> 0, 0);
    header.writeUInt32LE(arg0 >>> 0, 4);
    header.writeUInt32LE(arg1 >>> 0, 8);
    header.writeUInt32LE(payload.length, 12);
    header.writeUInt32LE(0, 16);
    header.writeUInt32LE(headerChecksum(command), 20);
    return Buffer.concat([header, payload]);
}

/**
 * Extract the fields of a connection-layer header.
 *
 * @param data Buffer starting with a header; extra bytes are ignored
 * @throws RangeError if fewer than HEADER_SIZE bytes are supplied
 */
export function decodeHeader(data: Buffer): PacketHeader {
    if (data.length < HEADER_SIZE) {
        throw new RangeError(`Malformed header: expected ${HEADER_SIZE} bytes, got ${data.length}`);
    }
    return {
        command: data.readUInt32LE(0),
        arg0: data.readUInt32LE(4),
        arg1: data.readUInt32LE(8),
        dataLength: data.readUInt32LE(12),
        checksum: data.readUInt32LE(20),
    };
}

/**
 * Sync request or data-frame header: an id and a length.
 */
export interface SyncHeader {
    id: number;
    length: number;
}

export function encodeSyncHeader(id: number, length: number): Buffer {
    const header = Buffer.alloc(SYNC_HEADER_SIZE);
    header.writeUInt32LE(id >>> 0, 0);
    header.writeUInt32LE(length >>> 0, 4);
    return header;
}

/**
 * @throws RangeError if fewer than SYNC_HEADER_SIZE bytes are supplied
 */
export function decodeSyncHeader(data: Buffer): SyncHeader {
    if (data.length < SYNC_HEADER_SIZE) {
        throw new RangeError(`Malformed sync header: expected ${SYNC_HEADER_SIZE} bytes, got ${data.length}`);
    }
    return { id: data.readUInt32LE(0), length: data.readUInt32LE(4) };
}

/**
 * Decode an OPEN payload: UTF-8 with trailing NUL terminators stripped.
 */
export function decodeDestination(payload: Buffer): string {
    return payload.toString('utf-8').replace(/\0+$/, '');
}

/**
 * Split a SEND path argument of the form "<path>,<mode>".
 * The mode is the last comma-separated field, so paths may themselves contain commas.
 *
 * @returns target path and POSIX mode, or null if the argument has no numeric mode
 */
export function parseSendArgument(argument: string): { target: string; mode: number } | null {
    const commaIndex = argument.lastIndexOf(',');
    if (commaIndex === -1) {
        return null;
    }
    const modeStr = argument.substring(commaIndex + 1);
    if (!/^\d+$/.test(modeStr)) {
        return null;
    }
    return { target: argument.substring(0, commaIndex), mode: parseInt(modeStr, 10) };
}

/**
 * Summarize binary data for log output.
 *
 * Example: a 32-byte OPEN packet → "OPEN and 32 bytes"
 */
export function describeBytes(data: Buffer): string {
    if (data.length < 4) {
        return `${data.length} bytes`;
    }
    return `${idToTag(data.readUInt32LE(0))} and ${data.length} bytes`;
}

/**
 * Log a message using the config callback if provided.
 *
 * @param config Configuration object with optional logCallback
 * @param message Message to log
 */
export function log(config: LogConfig, message: string): void {
    if (config.logCallback) {
        config.logCallback(message);
    }
}

/**
 * Safely extract error message from any error type.
 * Handles Error objects, strings, and unknown types.
 *
 * @param error Error to extract message from
 * @param fallback Optional fallback message if extraction fails or error is empty
 * @returns Error message string
 */
export function extractErrorMessage(error: unknown, fallback = 'Unknown error'): string {
    if (error == null) {
        return fallback;
    }
    if (error instanceof Error) {
        return error.message || fallback;
    }
    if (typeof error === 'object' && 'message' in error) {
        return String(error.message) || fallback;
    }
    const message = String(error);
    return message || fallback;
}

/**
 * Remove listeners from and destroy a socket.
 * Both steps are attempted; the first failure is logged and returned instead of thrown.
 *
 * @returns The first error raised during cleanup, or null
 */
export function cleanupSocket(socket: Pick<IClientSocket, 'removeAllListeners' | 'destroy'>, config: LogConfig, sessionId: string): unknown {
    let firstError: unknown = null;
    try {
        socket.removeAllListeners();
    } catch (err) {
        firstError = err;
        log(config, `[${sessionId}] Error: failed to remove socket listeners: ${extractErrorMessage(err)}`);
    }
    try {
        socket.destroy();
    } catch (err) {
        firstError = firstError ?? err;
        log(config, `[${sessionId}] Error: failed to destroy socket: ${extractErrorMessage(err)}`);
    }
    return firstError;
}
