function isWordCharacter(ch: string): boolean {
    const code = ch.charCodeAt(0);
    return (code >= 48 && code <= 57) || (code >= 97 && code <= 122) || (code >= 65 && code <= 90);
}

/**
 * Lower-cases text and collapses every run of non-alphanumeric characters
 * into one space, padding both ends so whole phrases can be found with
 * `includes(' phrase ')`.
 */
export function normalizePhrase(text: string): string {
    let out = ' ';
    for (const ch of text.toLowerCase()) {
        if (isWordCharacter(ch)) {
            out += ch;
        } else if (!out.endsWith(' ')) {
            out += ' ';
        }
    }
    return out.endsWith(' ') ? out : `${out} `;
}

export function containsPhrase(normalized: string, phrase: string): boolean {
    return normalized.includes(normalizePhrase(phrase));
}

/**
 * Splits text into lower-case alphanumeric words.
 */
export function words(text: string): string[] {
    return normalizePhrase(text).split(' ').filter(word => word.length > 0);
}

export { isWordCharacter };
