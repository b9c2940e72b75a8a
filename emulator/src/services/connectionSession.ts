/**
 * Connection Session - per-connection state machine of the emulated device.
 *
 *   INIT → HANDSHAKE_SENT ↔ IN_SYNC
 *   Any live state → ERROR → CLOSING → CLOSED or FATAL
 *   Any live state → CLOSING (peer closed or emulator stopping)
 *
 * Inbound bytes are buffered until a complete 24-byte header and its payload are present.
 * OPEN is recorded and acknowledged; every other command is ignored. An OPEN of "sync:"
 * hands the rest of the byte stream to a SyncSession until it sees QUIT.
 */

import { EventEmitter } from 'events';
import {
    log,
    idToTag,
    describeBytes,
    decodeHeader,
    decodeDestination,
    encodePacket,
    cleanupSocket,
    extractErrorMessage,
    AdbCommand,
    HEADER_SIZE,
    MAX_PAYLOAD,
    PROTOCOL_VERSION,
    SYNC_SERVICE,
} from '@device-emu/shared';
import type { IClientSocket, ISessionManager, LogConfig, PacketHeader, RecordLog, SyncRecord } from '@device-emu/shared';
import { SyncSession } from './syncHandler';

export type ConnectionState =
    | 'INIT'                // Accepted, greeting not sent yet
    | 'HANDSHAKE_SENT'      // Greeting sent, parsing connection-layer packets
    | 'IN_SYNC'             // Transfer stream open, bytes go to the sync handler
    | 'ERROR'               // Socket or write failure, cleanup pending
    | 'CLOSING'             // Cleanup in progress
    | 'CLOSED'              // Socket released
    | 'FATAL';              // Socket teardown failed

type StateEvent =
    | 'GREETING_SENT'
    | 'SYNC_STREAM_OPENED'
    | 'SYNC_QUIT'
    | 'ERROR_OCCURRED'
    | 'CLEANUP_REQUESTED'
    | 'CLEANUP_COMPLETE'
    | 'CLEANUP_ERROR';

type StateTransitionTable = {
    [K in ConnectionState]: {
        [E in StateEvent]?: ConnectionState;
    };
};

const STATE_TRANSITIONS: StateTransitionTable = {
    INIT: {
        GREETING_SENT: 'HANDSHAKE_SENT',
        ERROR_OCCURRED: 'ERROR',
        CLEANUP_REQUESTED: 'CLOSING',
    },
    HANDSHAKE_SENT: {
        SYNC_STREAM_OPENED: 'IN_SYNC',
        ERROR_OCCURRED: 'ERROR',
        CLEANUP_REQUESTED: 'CLOSING',
    },
    IN_SYNC: {
        SYNC_QUIT: 'HANDSHAKE_SENT',
        ERROR_OCCURRED: 'ERROR',
        CLEANUP_REQUESTED: 'CLOSING',
    },
    ERROR: {
        CLEANUP_REQUESTED: 'CLOSING',
    },
    CLOSING: {
        CLEANUP_COMPLETE: 'CLOSED',
        CLEANUP_ERROR: 'FATAL',
    },
    CLOSED: {},
    FATAL: {},
};

const LIVE_STATES: ConnectionState[] = ['INIT', 'HANDSHAKE_SENT', 'IN_SYNC'];

export interface ConnectionSessionConfig extends LogConfig {
    banner: string;
    syncPayload: Buffer;
    greetOnAccept: boolean;
    commandLog: RecordLog<string>;
    syncLog: RecordLog<SyncRecord>;
}

export class ConnectionSessionManager extends EventEmitter implements ISessionManager {
    private state: ConnectionState = 'INIT';
    private buffer: Buffer = Buffer.alloc(0);
    private syncSession: SyncSession | null = null;

    constructor(
        public readonly config: ConnectionSessionConfig,
        public readonly socket: IClientSocket,
        public readonly sessionId: string
    ) {
        super();

        this.on('CLIENT_DATA', this.handleClientData.bind(this));

        this.once('ERROR_OCCURRED', this.handleErrorOccurred.bind(this));
        this.once('CLEANUP_REQUESTED', this.handleCleanupRequested.bind(this));
        this.once('CLEANUP_COMPLETE', this.handleCleanupComplete.bind(this));
        this.once('CLEANUP_ERROR', this.handleCleanupError.bind(this));
    }

    // ========================================================================
    // Public Methods
    // ========================================================================

    /**
     * Begin servicing the accepted socket.
     * The greeting waits for the peer's first bytes unless greetOnAccept is set.
     */
    public start(): void {
        log(this.config, `[${this.sessionId}] Client connected`);
        if (this.config.greetOnAccept) {
            this.sendGreeting();
        }
        this.socket.resume();
    }

    public handleIncomingData(chunk: Buffer): void {
        if (!LIVE_STATES.includes(this.state)) {
            log(this.config, `[${this.sessionId}] Dropping ${chunk.length} bytes received in state ${this.state}`);
            return;
        }
        this.emit('CLIENT_DATA', chunk);
    }

    // ========================================================================
    // Event Handlers
    // ========================================================================

    private handleClientData(chunk: Buffer): void {
        this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;
        // The chunk that triggers the greeting is parsed right away rather than on the next read;
        // the reply order on the wire is the same, since the greeting is queued first
        if (this.state === 'INIT') {
            this.sendGreeting();
        }
        this.processBuffer();
    }

    private handleErrorOccurred(error: string): void {
        this.transition('ERROR_OCCURRED');
        log(this.config, `[${this.sessionId}] ${error}`);
        this.emit('CLEANUP_REQUESTED', true);
    }

    private handleCleanupRequested(hadError: boolean): void {
        const previousState = this.state;
        this.transition('CLEANUP_REQUESTED');
        log(this.config, `[${this.sessionId}] Starting cleanup (hadError=${hadError})`);

        // Late write callbacks may still emit; only the completion listeners survive
        const retain = new Set(['CLEANUP_COMPLETE', 'CLEANUP_ERROR']);
        this.eventNames()
            .filter(name => typeof name !== 'string' || !retain.has(name))
            .forEach(name => this.removeAllListeners(name));

        if (previousState === 'IN_SYNC') {
            log(this.config, `[${this.sessionId}] Sync session ended by connection close`);
        }
        this.syncSession = null;
        this.buffer = Buffer.alloc(0);

        const socketError = cleanupSocket(this.socket, this.config, this.sessionId);
        if (socketError) {
            this.emit('CLEANUP_ERROR', extractErrorMessage(socketError));
        } else {
            this.emit('CLEANUP_COMPLETE');
        }
        this.removeAllListeners();
    }

    private handleCleanupComplete(): void {
        this.transition('CLEANUP_COMPLETE');
        log(this.config, `[${this.sessionId}] Cleanup complete`);
    }

    private handleCleanupError(error: string): void {
        this.transition('CLEANUP_ERROR');
        log(this.config, `[${this.sessionId}] Fatal cleanup error: ${error}`);
    }

    // ========================================================================
    // Helper Methods
    // ========================================================================

    private transition(event: StateEvent): void {
        const nextState = STATE_TRANSITIONS[this.state][event];

        if (!nextState) {
            const error = new Error(`Invalid transition: ${this.state} + ${event} (no transition defined)`);
            log(this.config, `[${this.sessionId}] ${error.message}`);
            throw error;
        }

        const oldState = this.state;
        this.state = nextState;
        log(this.config, `[${this.sessionId}] ${oldState} → ${nextState} (event: ${event})`);
    }

    private sendGreeting(): void {
        this.transition('GREETING_SENT');
        const packet = encodePacket(AdbCommand.CNXN, PROTOCOL_VERSION, MAX_PAYLOAD, Buffer.from(this.config.banner, 'utf-8'));
        this.writeToClient(packet, `Sent CNXN greeting "${this.config.banner}"`);
    }

    /**
     * Drain every complete unit from the buffer, switching between packet and sync parsing.
     */
    private processBuffer(): void {
        let progressed = true;
        while (progressed && (this.state === 'HANDSHAKE_SENT' || this.state === 'IN_SYNC')) {
            progressed = this.state === 'IN_SYNC' ? this.processSyncData() : this.processPacket();
        }
    }

    private processPacket(): boolean {
        if (this.buffer.length < HEADER_SIZE) {
            return false;
        }
        const header = decodeHeader(this.buffer);
        const packetLength = HEADER_SIZE + header.dataLength;
        if (this.buffer.length < packetLength) {
            return false;
        }
        const payload = this.buffer.subarray(HEADER_SIZE, packetLength);
        this.buffer = this.buffer.subarray(packetLength);
        this.dispatchPacket(header, payload);
        return true;
    }

    private processSyncData(): boolean {
        const syncSession = this.syncSession;
        if (!syncSession || this.buffer.length === 0) {
            return false;
        }
        const result = syncSession.consume(this.buffer);
        this.buffer = this.buffer.subarray(result.consumed);
        if (result.finished) {
            this.syncSession = null;
            this.transition('SYNC_QUIT');
            return true;
        }
        return false;
    }

    private dispatchPacket(header: PacketHeader, payload: Buffer): void {
        if (header.command !== AdbCommand.OPEN) {
            log(this.config, `[${this.sessionId}] Ignoring ${idToTag(header.command)} (arg0=${header.arg0}, arg1=${header.arg1}, ${payload.length} bytes)`);
            return;
        }

        const destination = decodeDestination(payload);
        this.config.commandLog.append(destination);
        log(this.config, `[${this.sessionId}] OPEN ${destination} (local-id=${header.arg0})`);

        const reply = encodePacket(AdbCommand.OKAY, header.arg1, header.arg0);
        this.writeToClient(reply, `Acknowledged ${destination} with ${describeBytes(reply)}`);

        if (destination === SYNC_SERVICE) {
            this.transition('SYNC_STREAM_OPENED');
            this.syncSession = new SyncSession(
                { logCallback: this.config.logCallback, syncLog: this.config.syncLog, syncPayload: this.config.syncPayload },
                this.sessionId,
                (data, logMessage) => this.writeToClient(data, logMessage)
            );
        }
    }

    private writeToClient(data: Buffer, logMessage: string): void {
        this.socket.write(data, (err) => {
            if (err) {
                this.emit('ERROR_OCCURRED', `Write to client failed: ${err.message}`);
            } else {
                log(this.config, `[${this.sessionId}] ${logMessage}`);
            }
        });
    }
}
