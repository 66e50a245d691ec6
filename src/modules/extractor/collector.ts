import * as cheerio from 'cheerio';
import { AnyNode, hasChildren, isTag, isText } from 'domhandler';
import { logger } from '../observability';
import { errorMessage } from '../../utils/errors';

export interface CollectedMarkup {
    text: string;
    attributeValues: string[];
}

const MAILTO_PREFIX = /^\s*mailto:/i;

const empty = (): CollectedMarkup => ({ text: '', attributeValues: [] });

function collectText(nodes: AnyNode[], out: string[]): void {
    for (const node of nodes) {
        if (isText(node)) {
            out.push(node.data);
        } else if (hasChildren(node)) {
            collectText(node.children, out);
        }
    }
}

function collectAttributes(nodes: AnyNode[], out: string[]): void {
    for (const node of nodes) {
        if (isTag(node)) {
            const href = node.attribs.href;
            if (href && MAILTO_PREFIX.test(href)) {
                out.push(href.replace(MAILTO_PREFIX, '').trim());
            }

            for (const [name, value] of Object.entries(node.attribs)) {
                if (name.toLowerCase().includes('mail') && value.includes('@')) {
                    out.push(value);
                }
            }
        }
        if (hasChildren(node)) {
            collectAttributes(node.children, out);
        }
    }
}

/**
 * Splits a page into its visible text and the attribute values that tend to
 * carry addresses: mailto targets and anything named like "email" / "data-mail".
 * Text fragments are joined with spaces so a match never spans two elements.
 */
export function collectMarkup(markup: string | null | undefined): CollectedMarkup {
    if (!markup) return empty();

    try {
        const $ = cheerio.load(markup);
        const attributeValues: string[] = [];
        collectAttributes($.root().toArray(), attributeValues);

        $('script, style').remove();
        const fragments: string[] = [];
        collectText($.root().toArray(), fragments);

        return {
            text: fragments.join(' '),
            attributeValues
        };
    } catch (e) {
        logger.log('debug', `Markup could not be parsed: ${errorMessage(e)}`);
        return empty();
    }
}
