import fs from 'fs';
import path from 'path';
import { logger } from '../observability';
import { DispatchResult, MessageDispatcher } from '../../types';
import { InputError, errorMessage } from '../../utils/errors';

export interface MailboxClient {
    getProfileEmail(): Promise<string | undefined>;
    sendRaw(raw: string): Promise<string | undefined>;
}

export interface GmailSenderOptions {
    maxAttempts: number;
}

const TEMPLATE_PATH = path.join(__dirname, '../../../templates/default-email.txt');

export const DEFAULT_EMAIL_TEMPLATE = fs.readFileSync(TEMPLATE_PATH, 'utf8');

export const FALLBACK_SENDER = 'Authenticated Gmail Account';

// Client errors that a retry cannot fix
const NON_RETRYABLE_STATUSES = [400, 401, 403];

type ApiFailure = { status?: number; message: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

/**
 * Reads status and message out of a googleapis (gaxios) error.
 * Returns null for anything that did not come back from the API.
 */
export function describeApiError(error: unknown): ApiFailure | null {
    if (!isRecord(error)) return null;
    const response = error.response;
    if (!isRecord(response)) return null;

    const status = typeof response.status === 'number' ? response.status : undefined;
    let message = errorMessage(error);

    const data = response.data;
    if (isRecord(data)) {
        const apiError = data.error;
        if (isRecord(apiError) && typeof apiError.message === 'string') {
            message = apiError.message;
        } else if (typeof apiError === 'string') {
            message = apiError;
        }
    }

    return { status, message };
}

const stripLineBreaks = (value: string) => value.replace(/[\r\n]+/g, ' ').trim();

function encodeHeader(value: string): string {
    const clean = stripLineBreaks(value);
    // RFC 2047 encoded word for anything outside printable ASCII
    return /^[\x20-\x7e]*$/.test(clean)
        ? clean
        : `=?UTF-8?B?${Buffer.from(clean, 'utf8').toString('base64')}?=`;
}

function wrapBase64(value: string): string {
    return value.match(/.{1,76}/g)?.join('\r\n') ?? '';
}

/**
 * Builds a plain-text UTF-8 message and returns it base64url-encoded, the form
 * users.messages.send expects in `raw`.
 */
export function createMessage(to: string, subject: string, body: string, from?: string): string {
    const recipient = stripLineBreaks(to);
    if (!recipient.includes('@')) {
        throw new InputError(`Invalid recipient: "${recipient}"`);
    }

    const headers = [`To: ${recipient}`];
    if (from) headers.push(`From: ${stripLineBreaks(from)}`);
    headers.push(
        `Subject: ${encodeHeader(subject)}`,
        'MIME-Version: 1.0',
        'Content-Type: text/plain; charset="UTF-8"',
        'Content-Transfer-Encoding: base64'
    );

    const message = [
        ...headers,
        '',
        wrapBase64(Buffer.from(body, 'utf8').toString('base64'))
    ].join('\r\n');

    return Buffer.from(message, 'utf8').toString('base64url');
}

export class GmailSender implements MessageDispatcher {
    private senderEmail: string | null = null;
    private options: GmailSenderOptions;

    constructor(private client: MailboxClient, options?: Partial<GmailSenderOptions>) {
        this.options = { maxAttempts: options?.maxAttempts ?? 3 };
    }

    async senderIdentity(): Promise<string> {
        if (this.senderEmail) return this.senderEmail;

        try {
            this.senderEmail = (await this.client.getProfileEmail()) || 'Unknown';
        } catch (e) {
            logger.log('warn', `Could not retrieve sender email: ${errorMessage(e)}`);
            this.senderEmail = FALLBACK_SENDER;
        }
        return this.senderEmail;
    }

    async dispatch(to: string, subject: string, body: string, from?: string): Promise<DispatchResult> {
        let raw: string;
        try {
            raw = createMessage(to, subject, body, from);
        } catch (e) {
            return { success: false, kind: 'INVALID_MESSAGE', error: `Failed to create message: ${errorMessage(e)}` };
        }

        const attempts = this.options.maxAttempts;
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                const messageId = await this.client.sendRaw(raw);
                return { success: true, messageId: messageId || 'unknown' };
            } catch (e) {
                lastError = e;
                const apiFailure = describeApiError(e);

                if (apiFailure?.status !== undefined && NON_RETRYABLE_STATUSES.includes(apiFailure.status)) {
                    return { success: false, kind: 'REJECTED', error: `Gmail API error: ${apiFailure.message}` };
                }

                logger.log('warn', `Send to ${to} failed (attempt ${attempt}/${attempts}): ${apiFailure?.message ?? errorMessage(e)}`);
            }
        }

        const apiFailure = describeApiError(lastError);
        return {
            success: false,
            kind: 'EXHAUSTED',
            error: apiFailure
                ? `Gmail API error after ${attempts} attempts: ${apiFailure.message}`
                : `Unexpected error after ${attempts} attempts: ${errorMessage(lastError)}`
        };
    }
}
