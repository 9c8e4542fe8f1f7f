/**
 * Split text into lowercase word tokens.
 * - Letters and digits of any script
 * - Hyphens kept inside a word (кез-келген), trimmed at edges
 * - Pure numbers removed
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    return text
        .normalize('NFC')
        .toLowerCase()
        .replace(/[^\p{L}\p{M}\p{N}\s-]/gu, ' ')
        .split(/\s+/)
        .map((token) => token.replace(/^-+|-+$/g, ''))
        .filter((token) => token.length > 0 && !/^\d+$/.test(token));
}
