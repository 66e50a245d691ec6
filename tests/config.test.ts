import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { getConfig, loadConfig, parseConfig, resetConfig } from '../src/config';
import { ConfigurationError } from '../src/utils/errors';

const DEFAULTS = fs.readFileSync(path.join(__dirname, '../src/config/default.yaml'), 'utf8');

describe('Config Module', () => {
    afterEach(() => {
        resetConfig();
        delete process.env.GMAIL_TOKEN_FILE;
    });

    test('Loads the bundled defaults', () => {
        const config = loadConfig();

        expect(config.crawler.engine).toBe('browser');
        expect(config.crawler.contact_paths).toHaveLength(11);
        expect(config.crawler.contact_paths[0]).toBe('/contact');
        expect(config.dispatch.subject).toBe('Quick Collaboration Inquiry');
        expect(config.dispatch.max_attempts).toBe(3);
        expect(config.pacing.delay_ms).toBe(1000);
        expect(config.storage.format).toBe('all');
    });

    test('Caches the loaded config', () => {
        expect(getConfig()).toBe(getConfig());
    });

    test('Rejects invalid values with their path', () => {
        const broken = yaml.load(DEFAULTS.replace('engine: browser', 'engine: curl'));

        expect(() => parseConfig(broken)).toThrow(ConfigurationError);
        expect(() => parseConfig(broken)).toThrow(/crawler\.engine/);
    });

    test('Applies environment overrides', () => {
        process.env.GMAIL_TOKEN_FILE = '/tmp/test-token.json';
        expect(parseConfig(yaml.load(DEFAULTS)).dispatch.token_file).toBe('/tmp/test-token.json');
    });

    test('Fails on a missing config file', () => {
        expect(() => loadConfig('/nonexistent/config.yaml')).toThrow(ConfigurationError);
    });
});
