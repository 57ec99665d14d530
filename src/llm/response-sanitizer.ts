/**
 * Model output cleanup before it is read as a verdict.
 */

const REASONING_BLOCK = /<think>[\s\S]*?<\/think>/g;

/**
 * Remove every <think>...</think> section (markers included) and trim.
 * Repeats until no section is left, so removing one block cannot leave
 * a new one behind (`<th<think>a</think>ink>b</think>`).
 */
export function stripReasoning(text: string): string {
    let current = text;
    let next = current.replace(REASONING_BLOCK, '');
    while (next !== current) {
        current = next;
        next = current.replace(REASONING_BLOCK, '');
    }
    return current.trim();
}

/**
 * A verdict is positive only when the cleaned output is exactly "true"
 * (case-insensitive). Anything else, malformed output included, is negative.
 */
export function isAffirmativeVerdict(rawOutput: string): boolean {
    return stripReasoning(rawOutput).toLowerCase() === 'true';
}
