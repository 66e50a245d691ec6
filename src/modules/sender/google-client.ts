import fs from 'fs';
import readline from 'readline/promises';
import { google, gmail_v1, Auth } from 'googleapis';
import { z } from 'zod';
import { logger } from '../observability';
import type { MailboxClient } from './index';
import { AuthenticationError, errorMessage } from '../../utils/errors';

export const GMAIL_SCOPES = ['https://www.googleapis.com/auth/gmail.send'];

const ClientBlockSchema = z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    redirect_uris: z.array(z.string()).default(['http://localhost']),
});

const ClientSecretsSchema = z.object({
    installed: ClientBlockSchema.optional(),
    web: ClientBlockSchema.optional(),
});

const TokenSchema = z.object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    token_type: z.string().nullish(),
    scope: z.string().optional(),
    id_token: z.string().nullish(),
});

export interface GmailAuthOptions {
    credentialsFile: string;
    tokenFile: string;
}

function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(file, 'utf8'));
}

function loadSavedToken(tokenFile: string): Auth.Credentials | null {
    if (!fs.existsSync(tokenFile)) return null;
    try {
        return TokenSchema.parse(readJson(tokenFile));
    } catch (e) {
        logger.log('warn', `Error loading token from ${tokenFile}: ${errorMessage(e)}`);
        return null;
    }
}

function saveToken(tokenFile: string, credentials: Auth.Credentials): void {
    fs.writeFileSync(tokenFile, JSON.stringify(credentials, null, 2));
}

// Accepts either the bare code or the full redirect URL the browser ended on
export function extractAuthCode(input: string): string {
    const trimmed = input.trim();
    if (!trimmed.includes('code=')) return trimmed;
    try {
        return new URL(trimmed).searchParams.get('code') ?? trimmed;
    } catch {
        return new URLSearchParams(trimmed.slice(trimmed.indexOf('code='))).get('code') ?? trimmed;
    }
}

async function runConsentFlow(client: Auth.OAuth2Client): Promise<Auth.Credentials> {
    const authUrl = client.generateAuthUrl({ access_type: 'offline', prompt: 'consent', scope: GMAIL_SCOPES });
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        console.log(`\nAuthorize this app by visiting:\n${authUrl}\n`);
        const answer = await rl.question('Paste the authorization code (or the redirect URL): ');
        const { tokens } = await client.getToken(extractAuthCode(answer));
        return tokens;
    } finally {
        rl.close();
    }
}

/**
 * OAuth2 client for the Gmail send scope. Reuses the saved token when there is one,
 * otherwise runs the installed-app consent flow on the terminal. Refreshed tokens
 * are written back to the token file.
 */
export async function authorizeGmail(options: GmailAuthOptions): Promise<Auth.OAuth2Client> {
    if (!fs.existsSync(options.credentialsFile)) {
        throw new AuthenticationError(
            `Credentials file not found: ${options.credentialsFile}. Download OAuth2 client credentials from Google Cloud Console.`
        );
    }

    const secrets = ClientSecretsSchema.safeParse(readJson(options.credentialsFile));
    const block = secrets.success ? secrets.data.installed ?? secrets.data.web : undefined;
    if (!block) {
        throw new AuthenticationError(`No "installed" or "web" client in ${options.credentialsFile}`);
    }

    const client = new google.auth.OAuth2(block.client_id, block.client_secret, block.redirect_uris[0]);
    client.on('tokens', tokens => {
        const previous = loadSavedToken(options.tokenFile) ?? {};
        saveToken(options.tokenFile, { ...previous, ...tokens });
    });

    const saved = loadSavedToken(options.tokenFile);
    if (saved && (saved.refresh_token || saved.access_token)) {
        client.setCredentials(saved);
        return client;
    }

    const tokens = await runConsentFlow(client);
    client.setCredentials(tokens);
    saveToken(options.tokenFile, tokens);
    return client;
}

export class GoogleMailboxClient implements MailboxClient {
    private gmail: gmail_v1.Gmail;

    constructor(auth: Auth.OAuth2Client) {
        this.gmail = google.gmail({ version: 'v1', auth });
    }

    async getProfileEmail(): Promise<string | undefined> {
        const res = await this.gmail.users.getProfile({ userId: 'me' });
        return res.data.emailAddress ?? undefined;
    }

    async sendRaw(raw: string): Promise<string | undefined> {
        const res = await this.gmail.users.messages.send({ userId: 'me', requestBody: { raw } });
        return res.data.id ?? undefined;
    }
}
