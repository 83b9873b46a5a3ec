// CRM Selectors
// Page selectors for the CRM login, inbox and message views
// Kept in one table so a CRM markup change is a one-file edit

export const CRM_SELECTORS = {
    login: {
        username: 'input[name="username"], input[type="email"]',
        password: 'input[name="password"], input[type="password"]',
        submit: 'button[type="submit"], input[type="submit"]',
        securityQuestion: '#security_question, [data-test="security-question"]',
        securityAnswer: 'input[name="answer"], input[name="security_answer"]',
        securitySubmit: '#security_submit, button[name="verify"]',
    },
    inbox: {
        list: '#inbox, [data-test="inbox"]',
        row: '#inbox tr[data-id], [data-test="inbox"] [data-id]',
        rowId: 'data-id',
        rowSubject: '.subject',
        rowSender: '.from',
        rowDate: '.date',
        rowUnreadClass: 'unread',
    },
    message: {
        view: '#message, [data-test="message"]',
        subject: '#message .subject, [data-test="message-subject"]',
        sender: '#message .from, [data-test="message-from"]',
        recipient: '#message .to, [data-test="message-to"]',
        date: '#message .date, [data-test="message-date"]',
        body: '#message .body, [data-test="message-body"]',
        attachment: '#message .attachment, [data-test="message-attachment"]',
        replyButton: 'button[name="reply"], [data-test="reply"]',
        replyBody: 'textarea[name="body"], [data-test="reply-body"]',
        sendButton: 'button[name="send"], [data-test="send"]',
        saveDraftButton: 'button[name="save_draft"], [data-test="save-draft"]',
    },
} as const;

/**
 * URL of a single message view, relative to the inbox URL
 */
export function messageUrl(inboxUrl: string, emailId: string): string {
    const url = new URL(inboxUrl);
    url.searchParams.set('id', emailId);
    return url.toString();
}
