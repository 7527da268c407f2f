/**
 * CORE: Rule selection
 * Pure mapping from CLI words to a rule. No I/O.
 */

export const RULES = ['default', 'update', 'run', 'run nodejs', 'exit', 'CTLFS'] as const;

export type KnownRule = typeof RULES[number];

export type RuleSelection =
    | { kind: 'known'; rule: KnownRule; message?: string }
    | { kind: 'unknown'; rule: string };

function isKnownRule(value: string): value is KnownRule {
    return RULES.some(rule => rule === value);
}

/**
 * `build`                    -> default
 * `build update fix typo`    -> update, message "fix typo"
 * `build run nodejs`         -> run nodejs (two words or one quoted argument)
 */
export function parseRule(words: string[]): RuleSelection {
    const [first = '', ...rest] = words;
    const head = first.trim();

    if (head === 'update') {
        const message = rest.join(' ').trim();
        return message ? { kind: 'known', rule: 'update', message } : { kind: 'known', rule: 'update' };
    }

    // every other rule takes no extra words
    const target = [head, ...rest].join(' ').replace(/\s+/g, ' ').trim();

    if (target === '') {
        return { kind: 'known', rule: 'default' };
    }

    if (isKnownRule(target)) {
        return { kind: 'known', rule: target };
    }

    return { kind: 'unknown', rule: words.join(' ') };
}

export function noRuleMessage(rule: string): string {
    return `build: *** No rule to make target '${rule}'.  Stop.`;
}
