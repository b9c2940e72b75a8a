import type { AddressFamily } from './types';

export interface EnvironmentConfig {
    debugLogging: boolean;
    port: number;
    family: AddressFamily;
    greetOnAccept: boolean;
    upstreamPort: number | null;
}

function parseFlag(name: string, value: string | undefined): boolean {
    if (value === undefined || value === '') {
        return false;
    }
    if (/^(1|true|yes|on)$/i.test(value)) {
        return true;
    }
    if (/^(0|false|no|off)$/i.test(value)) {
        return false;
    }
    throw new Error(`Invalid boolean for ${name}: ${value}`);
}

function parsePort(name: string, value: string | undefined): number | null {
    if (value === undefined || value === '') {
        return null;
    }
    const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (isNaN(port) || port > 65535) {
        throw new Error(`Invalid port for ${name}: ${value}`);
    }
    return port;
}

/**
 * Read emulator settings from environment variables.
 *
 * DEVICE_EMU_DEBUG, DEVICE_EMU_PORT (0 = ephemeral), DEVICE_EMU_FAMILY (4 or 6),
 * DEVICE_EMU_GREET_ON_ACCEPT, DEVICE_EMU_UPSTREAM_PORT (enables the host request recorder).
 *
 * @throws Error naming the variable when a value cannot be parsed
 */
export function readEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
    const familyStr = env.DEVICE_EMU_FAMILY ?? '4';
    if (familyStr !== '4' && familyStr !== '6') {
        throw new Error(`Invalid address family for DEVICE_EMU_FAMILY: ${familyStr}`);
    }
    return {
        debugLogging: parseFlag('DEVICE_EMU_DEBUG', env.DEVICE_EMU_DEBUG),
        port: parsePort('DEVICE_EMU_PORT', env.DEVICE_EMU_PORT) ?? 0,
        family: familyStr === '6' ? 6 : 4,
        greetOnAccept: parseFlag('DEVICE_EMU_GREET_ON_ACCEPT', env.DEVICE_EMU_GREET_ON_ACCEPT),
        upstreamPort: parsePort('DEVICE_EMU_UPSTREAM_PORT', env.DEVICE_EMU_UPSTREAM_PORT),
    };
}
