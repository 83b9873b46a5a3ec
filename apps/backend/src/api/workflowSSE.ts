// SSE Connection Manager for Workflow Events
// Streams workflow state changes to connected review clients
// A client subscribes to one session, or to every session when it gives none

import type {
    ConnectionEstablishedStreamEvent,
    WorkflowEvent,
    WorkflowStateStreamEvent,
    WorkflowStreamEvent,
} from '@enrollment/contracts';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('workflow-sse');

const ALL_SESSIONS = '*';

/** The part of an HTTP response the stream writes to */
export interface SSEResponse {
    write(chunk: string): boolean;
    end(): void;
    on(event: 'close', listener: () => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
}

interface SSEClient {
    response: SSEResponse;
    connectedAt: number;
}

/**
 * Format event as SSE: data: {json}\n\n
 */
export function formatSSEEvent(event: WorkflowStreamEvent): string {
    return `data: ${JSON.stringify(event)}\n\n`;
}

export class WorkflowSSEManager {
    // Map<sessionId | '*', Set<SSEClient>>
    private readonly connections = new Map<string, Set<SSEClient>>();

    /**
     * Register a new SSE client
     * @returns unsubscribe function to remove client on disconnect
     */
    registerClient(sessionId: string | null, response: SSEResponse): () => void {
        const key = sessionId ?? ALL_SESSIONS;
        let clients = this.connections.get(key);
        if (!clients) {
            clients = new Set();
            this.connections.set(key, clients);
        }

        const client: SSEClient = { response, connectedAt: Date.now() };
        clients.add(client);
        logger.info(`Client connected for ${key}. Total clients: ${clients.size}`);

        response.on('close', () => {
            this.removeClient(key, client);
        });

        response.on('error', (error) => {
            logger.warn(`Client error for ${key}: ${error.message}`);
            this.removeClient(key, client);
        });

        const greeting: ConnectionEstablishedStreamEvent = {
            type: 'connection-established',
            sessionId,
            timestamp: Date.now(),
        };
        this.sendToClient(client, greeting);

        return () => this.removeClient(key, client);
    }

    /**
     * Deliver a workflow event to the session's clients and to catch-all clients
     */
    broadcast(event: WorkflowEvent): void {
        const streamEvent: WorkflowStateStreamEvent = {
            type: 'workflow.state',
            sessionId: event.sessionId,
            timestamp: Date.now(),
            event,
        };

        const targets = [
            ...(this.connections.get(event.sessionId) ?? []),
            ...(this.connections.get(ALL_SESSIONS) ?? []),
        ];
        if (targets.length === 0) return;

        for (const client of targets) {
            this.sendToClient(client, streamEvent);
        }
        logger.debug(`Broadcast ${event.state} for ${event.sessionId} to ${targets.length} clients`);
    }

    getClientCount(sessionId: string | null): number {
        return this.connections.get(sessionId ?? ALL_SESSIONS)?.size ?? 0;
    }

    closeAll(): void {
        for (const clients of this.connections.values()) {
            for (const client of clients) {
                client.response.end();
            }
        }
        this.connections.clear();
    }

    private removeClient(key: string, client: SSEClient): void {
        const clients = this.connections.get(key);
        if (!clients || !clients.delete(client)) return;

        logger.info(`Client disconnected for ${key}. Remaining clients: ${clients.size}`);
        if (clients.size === 0) {
            this.connections.delete(key);
        }
    }

    private sendToClient(client: SSEClient, event: WorkflowStreamEvent): void {
        try {
            client.response.write(formatSSEEvent(event));
        } catch (error) {
            logger.error('Error sending to client', undefined, error);
        }
    }
}
