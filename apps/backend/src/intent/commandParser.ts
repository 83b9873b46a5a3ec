// Command Parser
// Maps a spoken command to a workflow command
// Keyword rules, checked in order; the first rule that matches wins

import type { VoiceAction, VoiceCommand } from '@enrollment/contracts';

export interface ParsedCommand {
    command: VoiceCommand;
    action: VoiceAction;
    confidence: number;
}

interface CommandRule {
    command: Exclude<VoiceCommand, 'unknown'>;
    action: VoiceAction;
    matches: (text: string) => boolean;
}

const includesAny = (text: string, words: readonly string[]): boolean =>
    words.some((word) => text.includes(word));

const COMMAND_RULES: readonly CommandRule[] = [
    {
        command: 'login',
        action: 'browser_login',
        matches: (t) => includesAny(t, ['login', 'log in', 'sign in']),
    },
    {
        command: 'inbox',
        action: 'browser_navigate',
        matches: (t) => includesAny(t, ['inbox', 'emails']),
    },
    {
        command: 'read_email',
        action: 'email_read',
        matches: (t) => t.includes('read') && includesAny(t, ['email', 'message']),
    },
    {
        command: 'generate_response',
        action: 'email_generate',
        matches: (t) => includesAny(t, ['generate', 'respond', 'reply']),
    },
    {
        command: 'submit',
        action: 'email_send',
        matches: (t) => includesAny(t, ['submit', 'send']),
    },
    {
        command: 'save_draft',
        action: 'email_save_draft',
        matches: (t) => t.includes('save') && t.includes('draft'),
    },
    {
        command: 'end_session',
        action: 'session_end',
        matches: (t) => includesAny(t, ['end session', 'stop', 'goodbye']),
    },
];

const KEYWORD_CONFIDENCE = 0.9;

export function parseCommand(text: string): ParsedCommand {
    const normalized = text.toLowerCase().trim();

    if (normalized.length > 0) {
        for (const rule of COMMAND_RULES) {
            if (rule.matches(normalized)) {
                return { command: rule.command, action: rule.action, confidence: KEYWORD_CONFIDENCE };
            }
        }
    }

    return { command: 'unknown', action: 'none', confidence: 0 };
}
