/**
 * @file render-context.ts
 * @module renderer/render-context
 * @license MIT
 *
 * @fileoverview Ancestry stack consulted while rendering Doxygen XML.
 */

/**
 * Tags that each add one level of indentation to everything rendered
 * beneath them.
 */
export const INDENTING_TAGS: ReadonlySet<string> = new Set([
    'memberdef',
    'compounddef',
    'parameterdescription',
    'programlisting',
]);

/** Spaces per indentation level. */
export const INDENT_WIDTH = 3;

/**
 * Stack of the tags enclosing the element being rendered, plus the marker
 * `enum` while inside an enumeration.
 *
 * Every push is matched by exactly one pop; {@link RenderContext.within}
 * guarantees that even when rendering throws.
 */
export class RenderContext {
    private stack: string[] = [];

    push(tag: string): void {
        this.stack.push(tag);
    }

    pop(): string | undefined {
        return this.stack.pop();
    }

    /**
     * Run `fn` with `tags` pushed, popping them again afterwards.
     */
    within<T>(tags: readonly string[], fn: () => T): T {
        for (const tag of tags) {
            this.push(tag);
        }
        try {
            return fn();
        } finally {
            for (let i = 0; i < tags.length; i++) {
                this.pop();
            }
        }
    }

    top(): string | undefined {
        return this.stack[this.stack.length - 1];
    }

    has(tag: string): boolean {
        return this.stack.includes(tag);
    }

    get depth(): number {
        return this.stack.length;
    }

    /**
     * Leading whitespace for a line at the current nesting level.
     */
    indent(): string {
        const levels = this.stack.filter(tag => INDENTING_TAGS.has(tag)).length;
        return ' '.repeat(INDENT_WIDTH * levels);
    }

    snapshot(): readonly string[] {
        return [...this.stack];
    }
}
