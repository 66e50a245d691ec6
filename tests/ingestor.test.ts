import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadUrlsFromFile, uniqueUrls } from '../src/modules/ingestor';
import { InputError } from '../src/utils/errors';

describe('URL Ingestor', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'contact-finder-urls-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('Reads one URL per line and skips comments', () => {
        const file = path.join(dir, 'urls.txt');
        fs.writeFileSync(file, '# list\nhttps://acme.io\n\n  globex.test  \r\n#skip\n');

        expect(loadUrlsFromFile(file)).toEqual(['https://acme.io', 'globex.test']);
    });

    test('Reads the first CSV column after the header', () => {
        const file = path.join(dir, 'urls.CSV');
        fs.writeFileSync(file, 'website,name\nhttps://acme.io,Acme\n,Empty\n"https://globex.test",Globex\ninitech.test\n');

        expect(loadUrlsFromFile(file)).toEqual(['https://acme.io', 'https://globex.test', 'initech.test']);
    });

    test('Fails on a missing file', () => {
        expect(() => loadUrlsFromFile(path.join(dir, 'missing.txt'))).toThrow(InputError);
    });

    test('Drops repeated URLs and keeps order', () => {
        expect(uniqueUrls(['b.test', 'a.test', 'b.test'])).toEqual(['b.test', 'a.test']);
    });
});
