import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { InputError } from '../../utils/errors';

function readCsvUrls(contents: string): string[] {
    const rows: string[][] = parse(contents, {
        relax_column_count: true,
        skip_empty_lines: true,
        bom: true
    });

    // first row is a header
    return rows.slice(1)
        .map(row => (row[0] ?? '').trim())
        .filter(url => url.length > 0);
}

function readLineUrls(contents: string): string[] {
    return contents.split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Loads site URLs from a CSV (first column, header row skipped) or from a text
 * file with one URL per line and `#` comments.
 */
export function loadUrlsFromFile(filePath: string): string[] {
    if (!fs.existsSync(filePath)) {
        throw new InputError(`File not found: ${filePath}`);
    }

    const contents = fs.readFileSync(filePath, 'utf-8');
    return filePath.toLowerCase().endsWith('.csv') ? readCsvUrls(contents) : readLineUrls(contents);
}

export function uniqueUrls(urls: readonly string[]): string[] {
    return [...new Set(urls)];
}
