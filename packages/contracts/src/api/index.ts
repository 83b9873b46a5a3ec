// API Contracts
// Shared request/response shapes for the backend API
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type { WorkflowEvent, WorkflowState } from '../events/index.js';

// ============================================
// VOICE API
// ============================================

export type VoiceCommand =
    | 'login'
    | 'inbox'
    | 'read_email'
    | 'generate_response'
    | 'submit'
    | 'save_draft'
    | 'end_session'
    | 'unknown';

export type VoiceAction =
    | 'browser_login'
    | 'browser_navigate'
    | 'email_read'
    | 'email_generate'
    | 'email_send'
    | 'email_save_draft'
    | 'session_end'
    | 'none';

export interface VoiceCommandRequest {
    /** Base64 encoded linear16 audio */
    readonly audioData: string;
    readonly sampleRate?: number;
    readonly channels?: number;
}

export interface VoiceCommandResponse {
    readonly command: VoiceCommand;
    readonly transcript: string;
    readonly confidence: number;
    readonly action: VoiceAction;
    readonly status: 'success' | 'no_command';
    readonly message: string;
}

export interface WakeWordResponse {
    readonly detected: boolean;
    readonly confidence: number;
}

export type VoiceServiceStatus = 'running' | 'degraded' | 'disabled';

export type ActivatorState = 'stopped' | 'listening' | 'awaiting_command';

export interface ActivatorStatus {
    readonly isListening: boolean;
    readonly state: ActivatorState;
    readonly wakeWord: string;
    readonly commandsQueued: number;
}

export interface ActivatorAudioResult {
    readonly type: 'wake_word' | 'command' | 'none';
    readonly detected: boolean;
    readonly confidence?: number;
    readonly wakeWord?: string;
    readonly command?: string;
}

// ============================================
// BROWSER API
// ============================================

export type BrowserAction = 'start' | 'navigate' | 'click' | 'input' | 'content' | 'screenshot' | 'end';

export interface BrowserSessionRequest {
    readonly action: BrowserAction;
    readonly url?: string;
    readonly selector?: string;
    readonly text?: string;
    readonly sessionId?: string;
    /** Milliseconds */
    readonly timeout?: number;
}

export interface BrowserResponse {
    readonly sessionId: string | null;
    readonly status: 'success' | 'error';
    readonly content: string | null;
    /** Base64 encoded PNG */
    readonly screenshot: string | null;
    readonly error: string | null;
}

export interface LoginRequest {
    readonly username: string;
    readonly password: string;
    readonly securityAnswer?: string;
}

export type BrowserSessionStatus = 'active' | 'not_found';

// ============================================
// EMAIL API
// ============================================

export type EmailIntent =
    | 'status_inquiry'
    | 'application_requirements'
    | 'deadline_question'
    | 'financial_aid'
    | 'document_submission'
    | 'program_information'
    | 'general_inquiry';

export interface EmailContent {
    readonly emailId: string;
    readonly subject: string;
    readonly sender: string;
    readonly recipient: string;
    readonly date: string;
    readonly body: string;
    readonly attachments: readonly string[] | null;
}

export interface EmailSummary {
    readonly emailId: string;
    readonly subject: string;
    readonly sender: string;
    readonly date: string;
    readonly read: boolean;
}

export interface ProcessEmailRequest {
    readonly sessionId: string;
    /** When omitted, the first email in the inbox is processed */
    readonly emailId?: string;
}

export interface ProcessEmailResponse {
    readonly email: EmailContent;
    readonly suggestedResponse: string;
    readonly intent: EmailIntent;
    readonly confidence: number;
}

export interface SubmitDraftRequest {
    readonly emailId: string;
    readonly sessionId: string;
    readonly responseText: string;
    readonly send?: boolean;
}

export interface SubmitDraftResult {
    readonly emailId: string;
    readonly status: 'success';
    readonly action: 'sent' | 'saved as draft';
    readonly timestamp: string;
}

// ============================================
// WORKFLOW API
// ============================================

export interface CommandRequest {
    readonly command: string;
    readonly sessionId?: string;
}

export interface CommandResult {
    readonly status: 'success' | 'error' | 'ended';
    readonly message: string;
    readonly sessionId: string;
    readonly email?: EmailContent;
    readonly draftResponse?: string;
}

export interface CreateSessionResponse {
    readonly sessionId: string;
    readonly status: 'created';
}

export type EndSessionResponse =
    | { readonly status: 'ended'; readonly sessionId: string }
    | { readonly status: 'error'; readonly message: string };

export interface SessionSummary {
    readonly sessionId: string;
    readonly browserSessionId: string | null;
    readonly currentState: WorkflowState;
    readonly currentEmailId: string | null;
    readonly hasDraft: boolean;
    readonly startTime: string;
    readonly events: number;
    readonly lastEvent: WorkflowEvent | null;
}

export interface UpdateDraftRequest {
    readonly responseText: string;
}

// ============================================
// KNOWLEDGE API
// ============================================

export interface IngestKnowledgeRequest {
    readonly title: string;
    readonly content: string;
    readonly description?: string;
}

export interface KnowledgeDocumentDTO {
    readonly id: string;
    readonly title: string;
    readonly description?: string;
    readonly chunkCount: number;
    readonly createdAt: string;
    readonly updatedAt: string;
}

export interface KnowledgeMatchDTO {
    readonly chunkId: string;
    readonly documentId: string;
    readonly content: string;
    readonly similarity: number;
}

// ============================================
// MONITORING API
// ============================================

export interface ServiceMetricsDTO {
    readonly serviceName: string;
    readonly startTime: string;
    readonly uptime: string;
    readonly requests: {
        readonly total: number;
        readonly success: number;
        readonly error: number;
        readonly successRate: string;
    };
    readonly responseTime: {
        readonly average: string;
        readonly samples: number;
    };
    readonly lastError: {
        readonly message: string | null;
        readonly time: string | null;
    };
}

export interface SystemMetricsDTO {
    readonly startTime: string;
    /** Seconds */
    readonly uptime: number;
    readonly servicesCount: number;
    readonly totalRequests: number;
}

// ============================================
// HEALTH API
// ============================================

export interface HealthResponse {
    readonly status: 'healthy';
    readonly service: string;
    readonly version: string;
    readonly timestamp: string;
}
