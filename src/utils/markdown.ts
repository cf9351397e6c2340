function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Span of a `## Heading` section, up to the next level-2 heading or the end
 */
export function findSection(content: string, heading: string): { start: number; end: number } | null {
    const head = new RegExp(`^${escapeRegExp(heading)}\\b`, 'm').exec(content);
    if (!head) return null;

    const bodyStart = head.index + heading.length;
    const next = /^## /m.exec(content.slice(bodyStart));
    return { start: head.index, end: next ? bodyStart + next.index : content.length };
}
