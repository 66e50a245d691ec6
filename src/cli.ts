#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig } from './config';
import { ContactAutomation, summarize } from './pipeline';
import { EmailExtractor } from './modules/extractor';
import { loadUrlsFromFile, uniqueUrls } from './modules/ingestor';
import { logger, metrics } from './modules/observability';
import { errorMessage } from './utils/errors';

const RunOptionsSchema = z.object({
    url: z.string().optional(),
    urls: z.array(z.string()).optional(),
    file: z.string().optional(),
    config: z.string().optional(),
    credentials: z.string().optional(),
    token: z.string().optional(),
    send: z.boolean().optional(),
    headless: z.boolean().optional(),
    engine: z.enum(['browser', 'http']).optional(),
    format: z.enum(['csv', 'excel', 'sqlite', 'all']).optional(),
    subject: z.string().optional(),
    bodyFile: z.string().optional(),
    outputDir: z.string().optional(),
});

const ExtractOptionsSchema = z.object({
    site: z.string().optional(),
});

const program = new Command();

program
    .name('contact-finder')
    .description('Automated contact finder and email sender')
    .version('1.0.0');

program
    .command('run')
    .description('Find a contact address for each site and optionally email it')
    .option('--url <url>', 'Single company URL to process')
    .option('--urls <urls...>', 'Multiple company URLs to process')
    .option('--file <path>', 'File containing URLs (one per line or CSV)')
    .option('-c, --config <path>', 'Path to custom config YAML')
    .option('--credentials <path>', 'Path to Gmail OAuth2 credentials file')
    .option('--token <path>', 'Path to the stored Gmail OAuth2 token')
    .option('--no-send', 'Extract emails but do not send them')
    .option('--headless', 'Run browser in headless mode')
    .option('--no-headless', 'Run browser in visible mode')
    .option('--engine <engine>', 'Page fetch engine: browser or http')
    .option('--format <format>', 'Output format: csv, excel, sqlite or all')
    .option('--subject <subject>', 'Email subject line')
    .option('--body-file <path>', 'File containing email body template')
    .option('--output-dir <path>', 'Directory for result files')
    .addHelpText('after', `
Examples:
  $ contact-finder run --url "https://acme.test"
  $ contact-finder run --urls "https://acme.test" "https://globex.test"
  $ contact-finder run --file urls.txt --no-send
  $ contact-finder run --file urls.csv --format csv`)
    .action(async (rawOptions: unknown, command: Command) => {
        const parsed = RunOptionsSchema.safeParse(rawOptions);
        if (!parsed.success) {
            console.error(`Invalid options: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
            process.exit(1);
        }
        const options = parsed.data;

        const urls: string[] = [];
        if (options.url) urls.push(options.url);
        if (options.urls) urls.push(...options.urls);
        if (options.file) urls.push(...loadUrlsFromFile(path.resolve(options.file)));

        if (urls.length === 0) {
            command.outputHelp();
            console.error('\nError: No URLs provided. Use --url, --urls, or --file');
            process.exit(1);
        }

        const config = loadConfig(options.config && path.resolve(options.config));
        const automation = await ContactAutomation.create(config, {
            sendEmails: options.send === false ? false : undefined,
            headless: options.headless,
            engine: options.engine,
            subject: options.subject,
            bodyFile: options.bodyFile,
            credentialsFile: options.credentials,
            tokenFile: options.token,
            outputDir: options.outputDir,
        });

        try {
            const results = await automation.processCompanies(uniqueUrls(urls));
            const savedFiles = await automation.saveResults(results, options.format ?? config.storage.format);
            const summary = summarize(results);

            console.log('\n' + '='.repeat(60));
            console.log('PROCESSING SUMMARY');
            console.log('='.repeat(60));
            console.log(`Total Companies: ${summary.total}`);
            console.log(`Successfully Sent: ${summary.success}`);
            console.log(`No Email Found: ${summary.noEmail}`);
            console.log(`Failed: ${summary.failed}`);
            console.log('\nResults saved to:');
            for (const [formatType, filePath] of Object.entries(savedFiles)) {
                console.log(`  ${formatType.toUpperCase()}: ${filePath}`);
            }
            console.log('='.repeat(60));
            logger.log('info', 'Run finished', metrics.getSummary());
        } finally {
            await automation.close();
        }
    });

program
    .command('extract')
    .description('Rank the contact addresses found in a local HTML file')
    .argument('<htmlFile>', 'Saved page markup')
    .option('--site <url>', 'Site URL, used for the domain relevance check')
    .action((htmlFile: string, rawOptions: unknown) => {
        const options = ExtractOptionsSchema.parse(rawOptions);
        const markup = fs.readFileSync(path.resolve(htmlFile), 'utf-8');
        const found = new EmailExtractor(options.site).analyze(markup);

        if (found.length === 0) {
            console.log('No email addresses found');
            return;
        }
        for (const [index, item] of found.entries()) {
            const flags = [item.priority ? 'priority' : null, item.related ? null : 'other-domain']
                .filter((flag): flag is string => flag !== null);
            console.log(`${index + 1}. ${item.address}${flags.length ? ` (${flags.join(', ')})` : ''}`);
        }
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error('Fatal Error:', errorMessage(e));
    process.exit(1);
});
