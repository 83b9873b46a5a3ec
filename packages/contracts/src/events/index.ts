// Event Contracts
// Shared event schemas for the workflow state machine and voice activation
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

// ============================================
// WORKFLOW STATES
// ============================================

export type WorkflowState =
    | 'idle'
    | 'listening'
    | 'processing_command'
    | 'authenticating'
    | 'navigating'
    | 'reading_email'
    | 'generating_response'
    | 'reviewing'
    | 'submitting'
    | 'error';

// ============================================
// WORKFLOW EVENTS
// ============================================

/** One entry in a session's history; the latest entry defines the session state */
export interface WorkflowEvent {
    readonly sessionId: string;
    readonly state: WorkflowState;
    /** ISO timestamp */
    readonly timestamp: string;
    readonly data: Readonly<Record<string, unknown>> | null;
    readonly message: string | null;
}

// ============================================
// VOICE ACTIVATION EVENTS
// ============================================

export interface WakeWordDetectedEvent {
    readonly event: 'wake_word_detected';
    readonly transcript: string;
    readonly confidence: number;
}

export interface CommandDetectedEvent {
    readonly event: 'command_detected';
    readonly command: string;
    readonly confidence: number;
}

export type VoiceActivationEvent = WakeWordDetectedEvent | CommandDetectedEvent;

// ============================================
// STREAM EVENTS (SSE)
// ============================================

export interface ConnectionEstablishedStreamEvent {
    readonly type: 'connection-established';
    readonly sessionId: string | null;
    readonly timestamp: number;
}

export interface WorkflowStateStreamEvent {
    readonly type: 'workflow.state';
    readonly sessionId: string;
    readonly timestamp: number;
    readonly event: WorkflowEvent;
}

export type WorkflowStreamEvent = ConnectionEstablishedStreamEvent | WorkflowStateStreamEvent;
