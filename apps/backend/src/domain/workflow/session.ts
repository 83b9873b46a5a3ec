// Workflow Session
// One counselor session: browser login, current email, draft and event history
// The latest event defines the session state

import type {
    EmailContent,
    SessionSummary,
    WorkflowEvent,
    WorkflowState,
} from '@enrollment/contracts';

export type Clock = () => Date;

export class WorkflowSession {
    browserSessionId: string | null = null;
    currentEmailId: string | null = null;
    currentEmail: EmailContent | null = null;
    draftResponse: string | null = null;
    currentState: WorkflowState = 'idle';
    readonly startTime: Date;
    readonly events: WorkflowEvent[] = [];

    constructor(
        readonly sessionId: string,
        private readonly clock: Clock = () => new Date()
    ) {
        this.startTime = clock();
    }

    addEvent(
        state: WorkflowState,
        message: string | null = null,
        data: Record<string, unknown> | null = null
    ): WorkflowEvent {
        const event: WorkflowEvent = {
            sessionId: this.sessionId,
            state,
            timestamp: this.clock().toISOString(),
            data,
            message,
        };
        this.events.push(event);
        this.currentState = state;
        return event;
    }

    clearEmail(): void {
        this.currentEmailId = null;
        this.currentEmail = null;
        this.draftResponse = null;
    }

    summary(): SessionSummary {
        return {
            sessionId: this.sessionId,
            browserSessionId: this.browserSessionId,
            currentState: this.currentState,
            currentEmailId: this.currentEmailId,
            hasDraft: Boolean(this.draftResponse),
            startTime: this.startTime.toISOString(),
            events: this.events.length,
            lastEvent: this.events.at(-1) ?? null,
        };
    }
}
