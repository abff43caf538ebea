/**
 * @file signature.ts
 * @module utils/signature
 * @license MIT
 *
 * @fileoverview Splits member signatures from page specs into a bare name and
 * a parameter list spelled the way Doxygen spells it.
 */

/**
 * One rewrite step of parameter-list normalization.
 */
export interface SignatureRule {
    name: string;
    pattern: RegExp;
    replacement: string;
}

/**
 * Rewrites applied in order to the text between the parentheses.
 * Doxygen writes `std::vector< int > const &`, page specs usually don't.
 */
export const PARAM_RULES: readonly SignatureRule[] = [
    { name: 'collapse-whitespace', pattern: /\s{2,}/g, replacement: ' ' },
    { name: 'space-after-open-angle', pattern: /(?<=<)(?=\S)/g, replacement: ' ' },
    { name: 'space-before-close-angle', pattern: /(?<=\S)(?=>)/g, replacement: ' ' },
    { name: 'space-before-ampersand', pattern: /(?<=[^\s&])(?=&)/g, replacement: ' ' },
    { name: 'space-after-ampersand', pattern: /(?<=&)(?=[^\s&])/g, replacement: ' ' },
    { name: 'tight-commas', pattern: /\s*,\s*/g, replacement: ',' },
];

/**
 * Doxygen quirk: for parameters such as `std::function<void(bool&)>` it
 * emits `&)>` at the very end rather than the `& ) >` the rules above
 * produce. Only the trailing occurrence is rewritten.
 */
export const TRAILING_REF_CLOSE_PATCH: SignatureRule = {
    name: 'trailing-ref-close',
    pattern: /& \) >$/,
    replacement: '&)>',
};

/**
 * Normalize a parameter list (without the surrounding parentheses).
 *
 * @example
 * ```typescript
 * normalizeParams('std::vector<int>const&,  size_t'); // 'std::vector< int >const &,size_t'
 * ```
 */
export function normalizeParams(params: string): string {
    let result = params.trim();
    for (const rule of PARAM_RULES) {
        result = result.replace(rule.pattern, rule.replacement);
    }
    if (result.endsWith('& ) >')) {
        result = result.replace(TRAILING_REF_CLOSE_PATCH.pattern, TRAILING_REF_CLOSE_PATCH.replacement);
    }
    return result;
}

/**
 * Bare member name and normalized parameter signature; the signature is
 * `null` when the entry has no parentheses and so names no overload.
 */
export type MemberSignature = [name: string, params: string | null];

/**
 * Split a page-spec member entry into its name and parameter signature.
 *
 * The signature keeps anything after the closing parenthesis, so
 * qualifiers such as ` const` or ` noexcept` take part in overload matching.
 *
 * @example
 * ```typescript
 * extractSignature('foo(int, double)');               // ['foo', '(int,double)']
 * extractSignature('bar');                            // ['bar', null]
 * extractSignature('template <typename T> foo(T x)'); // ['foo', '(T x)']
 * ```
 */
export function extractSignature(entry: string): MemberSignature {
    const trimmed = entry.trim();
    const lpos = trimmed.indexOf('(');
    if (lpos === -1) {
        return [trimmed, null];
    }
    let rpos = trimmed.lastIndexOf(')');
    if (rpos < lpos) {
        rpos = trimmed.length;
    }
    const params = '(' + normalizeParams(trimmed.slice(lpos + 1, rpos)) + trimmed.slice(rpos);
    if (trimmed.startsWith('template')) {
        const space = lpos > 0 ? trimmed.lastIndexOf(' ', lpos - 1) : -1;
        return [trimmed.slice(space + 1, lpos), params];
    }
    return [trimmed.slice(0, lpos), params];
}
