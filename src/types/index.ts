export enum ProcessStatus {
    SUCCESS = 'Success',
    FAILED = 'Failed',
    NO_EMAIL_FOUND = 'No Email Found',
    SEND_FAILED = 'Send Failed',
    FOUND_NOT_SENT = 'Email Found (Not Sent)',
    ERROR = 'Error',
}

export type OutcomeRecord = {
    company: string;
    url: string;
    resolvedUrl: string; // page the address was read from, empty when the crawl failed
    emailFound: string;
    status: ProcessStatus;
    messageId: string;
    error: string;
    senderEmail: string;
    timestamp: string; // local time, YYYY-MM-DD HH:mm:ss
};

export type FetchErrorKind = 'TIMEOUT' | 'HTTP_STATUS' | 'NETWORK';

export type PageFetchResult =
    | { ok: true; status: number; html: string; finalUrl: string }
    | { ok: false; kind: FetchErrorKind; detail: string; status?: number };

export interface PageFetcher {
    readonly name: string;
    fetch(url: string): Promise<PageFetchResult>;
    close(): Promise<void>;
}

export type CrawlResult =
    | { ok: true; url: string; finalUrl: string; html: string }
    | { ok: false; url: string; finalUrl: string; kind: FetchErrorKind; error: string };

export type DispatchErrorKind = 'INVALID_MESSAGE' | 'REJECTED' | 'EXHAUSTED';

export type DispatchResult =
    | { success: true; messageId: string }
    | { success: false; kind: DispatchErrorKind; error: string };

export interface MessageDispatcher {
    senderIdentity(): Promise<string>;
    dispatch(to: string, subject: string, body: string, from?: string): Promise<DispatchResult>;
}
