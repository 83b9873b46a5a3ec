// Reply Drafting Prompt Builder
// Builds the JSON-mode prompt for drafting a reply to a student email

import type { EmailContent, EmailIntent } from '@enrollment/contracts';
import type { KnowledgeSnippet } from './types.js';
import { EMAIL_INTENTS } from '../../intent/emailIntent.js';

const MAX_BODY_CHARS = 6000;
const MAX_SNIPPETS = 3;

const SYSTEM_PROMPT = `You draft email replies for a university enrollment counselor.

OUTPUT FORMAT:
You MUST respond with ONLY valid JSON matching this exact schema:
{
  "intent": "<one of: ${EMAIL_INTENTS.join(' | ')}>",
  "confidence": <number 0.0 to 1.0>,
  "response": "<the full reply text, greeting through signature>"
}

STRICT RULES:
1. Output ONLY JSON. No explanations, no markdown, no commentary.
2. Be warm, concise and professional.
3. Use ONLY facts from the reference material. Never invent dates, amounts or policies.
4. When the answer is not in the reference material, say the counselor will follow up.
5. Sign the reply as "Enrollment Counseling Team".
6. A counselor reviews every draft before it is sent.`;

export function buildDraftPrompt(
    email: EmailContent,
    knowledge: readonly KnowledgeSnippet[],
    keywordIntent: EmailIntent
): { system: string; user: string } {
    const body = email.body.length > MAX_BODY_CHARS
        ? `${email.body.slice(0, MAX_BODY_CHARS)}...`
        : email.body;

    const reference = knowledge
        .slice(0, MAX_SNIPPETS)
        .map((snippet, i) => `[${i + 1}] ${snippet.content}`)
        .join('\n\n');

    const user = `Draft a reply to this student email.

EMAIL:
- From: ${email.sender}
- Subject: ${email.subject}
- Date: ${email.date}
${email.attachments ? `- Attachments: ${email.attachments.join(', ')}\n` : ''}
${body}

KEYWORD INTENT HINT: ${keywordIntent}

REFERENCE MATERIAL:
${reference || '(none)'}

Return ONLY the JSON object as specified.`;

    return { system: SYSTEM_PROMPT, user };
}
