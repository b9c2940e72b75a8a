/**
 * Sync Sub-protocol Handler
 *
 * Runs inside a connection once an OPEN for "sync:" has been acknowledged.
 * Parses the byte stream incrementally so the owning connection never blocks:
 *   AWAIT_REQUEST → (SEND) AWAIT_FILE_FRAME ↔ SKIPPING_FILE_DATA → (DONE) AWAIT_REQUEST
 *   AWAIT_REQUEST → (RECV) reply DATA + DONE → AWAIT_REQUEST
 *   AWAIT_REQUEST → (QUIT) FINISHED
 *
 * Every request is appended to the sync log before any reply is written.
 * File content pushed with SEND is counted and discarded.
 */

import {
    log,
    idToTag,
    decodeSyncHeader,
    encodeSyncHeader,
    parseSendArgument,
    SyncOperation,
    SYNC_HEADER_SIZE,
} from '@device-emu/shared';
import type { LogConfig, RecordLog, SyncRecord } from '@device-emu/shared';

type SyncPhase = 'AWAIT_REQUEST' | 'AWAIT_FILE_FRAME' | 'SKIPPING_FILE_DATA' | 'FINISHED';

export interface SyncSessionConfig extends LogConfig {
    syncLog: RecordLog<SyncRecord>;
    /** Content returned for every RECV */
    syncPayload: Buffer;
}

export interface SyncConsumeResult {
    /** Bytes taken from the front of the supplied buffer */
    consumed: number;
    /** True once QUIT has been processed; remaining bytes belong to the connection layer */
    finished: boolean;
}

export class SyncSession {
    private phase: SyncPhase = 'AWAIT_REQUEST';
    private skipRemaining = 0;
    private fileBytes = 0;
    private fileTarget = '';

    constructor(
        private readonly config: SyncSessionConfig,
        private readonly sessionId: string,
        private readonly write: (data: Buffer, logMessage: string) => void
    ) {}

    getPhase(): SyncPhase {
        return this.phase;
    }

    /**
     * Process as many complete requests and frames as `data` holds.
     * Incomplete requests are left unconsumed; DATA payloads are consumed as they arrive.
     */
    consume(data: Buffer): SyncConsumeResult {
        let offset = 0;
        while (this.phase !== 'FINISHED') {
            const used = this.step(data.subarray(offset));
            if (used === 0) {
                break;
            }
            offset += used;
        }
        return { consumed: offset, finished: this.phase === 'FINISHED' };
    }

    private step(data: Buffer): number {
        switch (this.phase) {
            case 'AWAIT_REQUEST':
                return this.readRequest(data);
            case 'AWAIT_FILE_FRAME':
                return this.readFileFrame(data);
            case 'SKIPPING_FILE_DATA':
                return this.skipFileData(data);
            case 'FINISHED':
                return 0;
        }
    }

    private readRequest(data: Buffer): number {
        if (data.length < SYNC_HEADER_SIZE) {
            return 0;
        }
        const { id, length } = decodeSyncHeader(data);
        if (data.length < SYNC_HEADER_SIZE + length) {
            return 0;
        }
        const path = data.toString('utf-8', SYNC_HEADER_SIZE, SYNC_HEADER_SIZE + length);
        this.record(id, path);

        switch (id) {
            case SyncOperation.SEND:
                this.phase = 'AWAIT_FILE_FRAME';
                this.fileBytes = 0;
                this.fileTarget = path;
                break;
            case SyncOperation.RECV: {
                const payload = this.config.syncPayload;
                this.write(
                    Buffer.concat([encodeSyncHeader(SyncOperation.DATA, payload.length), payload]),
                    `Sync RECV ${path}: sent ${payload.length} bytes`
                );
                this.write(encodeSyncHeader(SyncOperation.DONE, 0), `Sync RECV ${path}: sent DONE`);
                break;
            }
            case SyncOperation.QUIT:
                this.phase = 'FINISHED';
                log(this.config, `[${this.sessionId}] Sync QUIT, leaving sync session`);
                break;
            default:
                log(this.config, `[${this.sessionId}] Warning: ignoring unsupported sync request ${idToTag(id)}`);
                break;
        }
        return SYNC_HEADER_SIZE + length;
    }

    private readFileFrame(data: Buffer): number {
        if (data.length < SYNC_HEADER_SIZE) {
            return 0;
        }
        const { id, length } = decodeSyncHeader(data);
        if (id === SyncOperation.DONE) {
            // DONE carries a timestamp in its length field, never a payload
            this.phase = 'AWAIT_REQUEST';
            this.write(
                encodeSyncHeader(SyncOperation.OKAY, 0),
                `Sync SEND ${this.fileTarget}: received ${this.fileBytes} bytes, sent OKAY`
            );
            return SYNC_HEADER_SIZE;
        }
        if (id !== SyncOperation.DATA) {
            log(this.config, `[${this.sessionId}] Warning: unexpected ${idToTag(id)} frame during SEND, skipping ${length} bytes`);
        }
        this.skipRemaining = length;
        this.phase = length > 0 ? 'SKIPPING_FILE_DATA' : 'AWAIT_FILE_FRAME';
        return SYNC_HEADER_SIZE;
    }

    private skipFileData(data: Buffer): number {
        const used = Math.min(data.length, this.skipRemaining);
        this.skipRemaining -= used;
        this.fileBytes += used;
        if (this.skipRemaining === 0) {
            this.phase = 'AWAIT_FILE_FRAME';
        }
        return used;
    }

    private record(operation: number, path: string): void {
        const entry: SyncRecord = { operation, path };
        if (operation === SyncOperation.SEND) {
            const parsed = parseSendArgument(path);
            if (parsed) {
                entry.target = parsed.target;
                entry.mode = parsed.mode;
            }
        }
        this.config.syncLog.append(entry);
        log(this.config, `[${this.sessionId}] Sync ${idToTag(operation)} ${path}`);
    }
}
