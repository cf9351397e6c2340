import { readFile } from 'node:fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { EvaluationError, errorMessage } from '../errors.js';
import type { QaPair } from './types.js';

const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    isArray: name => name === 'qa_pair',
});

/**
 * Collect every `<qa_pair>` in document order, at any depth
 *
 * ```xml
 * <evaluation>
 *   <qa_pair>
 *     <question>How many open issues are labelled "bug"?</question>
 *     <answer>7</answer>
 *   </qa_pair>
 * </evaluation>
 * ```
 *
 * Pairs missing a question or answer are skipped.
 */
export function parseEvaluationFile(xml: string): QaPair[] {
    const valid = XMLValidator.validate(xml);
    if (valid !== true) {
        throw new EvaluationError(`Malformed evaluation XML (line ${valid.err.line}): ${valid.err.msg}`);
    }

    let doc: unknown;
    try {
        doc = parser.parse(xml);
    } catch (err) {
        throw new EvaluationError(`Malformed evaluation XML: ${errorMessage(err)}`, { cause: err });
    }

    const pairs: QaPair[] = [];
    collect(doc, pairs);
    return pairs;
}

export async function loadEvaluationFile(filePath: string): Promise<QaPair[]> {
    let xml: string;
    try {
        xml = await readFile(filePath, 'utf-8');
    } catch (err) {
        throw new EvaluationError(`Cannot read evaluation file ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
    return parseEvaluationFile(xml);
}

function collect(node: unknown, out: QaPair[]): void {
    if (Array.isArray(node)) {
        for (const item of node) collect(item, out);
        return;
    }
    if (!node || typeof node !== 'object') return;

    for (const [key, value] of Object.entries(node)) {
        if (key === 'qa_pair' && Array.isArray(value)) {
            for (const entry of value) {
                const pair = toPair(entry);
                if (pair) out.push(pair);
            }
        } else {
            collect(value, out);
        }
    }
}

function toPair(entry: unknown): QaPair | null {
    if (!entry || typeof entry !== 'object') return null;
    const question = 'question' in entry ? textOf(entry.question) : '';
    const answer = 'answer' in entry ? textOf(entry.answer) : '';
    return question && answer ? { question, answer } : null;
}

function textOf(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value).trim();
    return '';
}
