import { WebSocketServer, WebSocket } from 'ws';
import { OrreryError } from '@shared/errors';
import { parseClientMessage } from '@shared/messages';
import type { ServerToClientMessage } from '@shared/messages';
import type { ServerConfig } from './config';
import type { ISimulationService } from './simulationService';

/**
 * Returns a handler for raw client frames. Every frame either updates the
 * service, is answered through `postResponse`, or is answered with an error
 * message when it cannot be understood.
 */
export function createMessageHandler(
    service: ISimulationService,
    postResponse: (message: ServerToClientMessage) => void,
) {
    const handleMessage = (raw: string): void => {
        try {
            const message = parseClientMessage(raw);
            switch (message.type) {
                case 'query':
                    postResponse({ type: 'queryResult', queryId: message.queryId, state: service.query() });
                    break;
                case 'setTimeScale':
                    service.setTimeScale(message.scale);
                    break;
                case 'setTime':
                    service.setTime(message.time);
                    break;
            }
        } catch (err) {
            if (!(err instanceof OrreryError)) throw err;
            postResponse({ type: 'error', message: err.message });
        }
    };

    return handleMessage;
}

/**
 * One step of the broadcast loop. A tick that throws is logged and skipped so
 * the interval keeps running.
 */
export function createBroadcastTick(service: ISimulationService, sendFrame: (frame: Buffer) => void) {
    return (): void => {
        try {
            service.tick();
        } catch (err) {
            // eslint-disable-next-line no-console
            console.error('Simulation tick failed:', err);
            return;
        }
        const frame = service.getLatestData();
        if (frame) sendFrame(frame);
    };
}

export interface RunningServer {
    close(): void;
}

/**
 * Serves the simulation over WebSocket: answers each connection's commands
 * and broadcasts the latest frame to every open client once per tick.
 */
export function startServer(
    service: ISimulationService,
    config: Pick<ServerConfig, 'port' | 'tickRateHz'>,
): RunningServer {
    const wss = new WebSocketServer({ port: config.port });
    // eslint-disable-next-line no-console
    console.log(`Orrery listening on ws://localhost:${config.port} at ${config.tickRateHz} Hz`);

    wss.on('connection', (socket) => {
        const handleMessage = createMessageHandler(service, (message) => {
            if (socket.readyState === WebSocket.OPEN) {
                socket.send(JSON.stringify(message));
            }
        });
        socket.on('message', (data) => {
            try {
                handleMessage(data.toString());
            } catch (err) {
                // eslint-disable-next-line no-console
                console.error('Failed to handle client message:', err);
            }
        });
    });

    const broadcast = setInterval(
        createBroadcastTick(service, (frame) => {
            for (const client of wss.clients) {
                if (client.readyState === WebSocket.OPEN) {
                    client.send(frame);
                }
            }
        }),
        1000 / config.tickRateHz,
    );

    return {
        close() {
            clearInterval(broadcast);
            service.shutdown();
            wss.close();
        },
    };
}
