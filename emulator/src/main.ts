/**
 * Command-line entry
 *
 * Runs one device emulator, plus a host request recorder when DEVICE_EMU_UPSTREAM_PORT
 * is set, until SIGINT or SIGTERM. Prints "port=<n>" (and "recorder-port=<n>") on stdout
 * so a parent process can connect to it.
 */

import { readEnvironmentConfig, extractErrorMessage, idToTag } from '@device-emu/shared';
import { DeviceEmulator } from './services/deviceEmulator';
import { HostRequestRecorder } from './services/hostRequestRecorder';

function createLogCallback(debugLogging: boolean): ((message: string) => void) | undefined {
    if (!debugLogging) {
        return undefined;
    }
    return (message: string) => console.error(`[${new Date().toISOString()}] ${message}`);
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
    const settings = readEnvironmentConfig(env);
    const logCallback = createLogCallback(settings.debugLogging);

    const emulator = new DeviceEmulator({
        logCallback,
        port: settings.port,
        greetOnAccept: settings.greetOnAccept,
    });
    const { port, commandLog, syncLog } = await emulator.start(settings.family);
    console.log(`port=${port}`);

    let recorder: HostRequestRecorder | null = null;
    if (settings.upstreamPort !== null) {
        recorder = new HostRequestRecorder({ logCallback, upstreamPort: settings.upstreamPort });
        const handle = await recorder.start();
        console.log(`recorder-port=${handle.port}`);
    }

    let stopping = false;
    const shutdown = async (signal: string) => {
        if (stopping) {
            return;
        }
        stopping = true;
        console.error(`Received ${signal}, stopping`);
        await emulator.stop();
        await recorder?.stop();

        for (const command of commandLog.snapshot()) {
            console.log(`command ${command}`);
        }
        for (const entry of syncLog.snapshot()) {
            console.log(`sync ${idToTag(entry.operation)} ${entry.path}`);
        }
        for (const request of recorder?.requests.snapshot() ?? []) {
            console.log(`host-request ${request}`);
        }
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            shutdown(signal).catch((err: unknown) => {
                console.error(`Shutdown failed: ${extractErrorMessage(err)}`);
                process.exitCode = 1;
            });
        });
    }
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error(`Failed to start device emulator: ${extractErrorMessage(err)}`);
        process.exitCode = 1;
    });
}
