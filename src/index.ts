export { EmailExtractor } from './modules/extractor';
export type { AddressAnalysis } from './modules/extractor';
export { SiteCrawler, planUrls } from './modules/crawler';
export { BrowserPageFetcher } from './modules/browser';
export { HttpPageFetcher } from './modules/fetcher';
export { GmailSender, createMessage, DEFAULT_EMAIL_TEMPLATE } from './modules/sender';
export type { MailboxClient } from './modules/sender';
export { GoogleMailboxClient, authorizeGmail } from './modules/sender/google-client';
export { ResultStorage } from './modules/storage';
export { loadUrlsFromFile, uniqueUrls } from './modules/ingestor';
export { ContactAutomation, summarize } from './pipeline';
export { loadConfig, getConfig } from './config';
export type { Config } from './config';
export * from './types';
