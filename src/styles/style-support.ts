/**
 * Style Support
 * @module styles/style-support
 *
 * Argument handling shared by the style front-ends.
 */

export interface TestOptions {
  readonly tags?: ReadonlyArray<string>;
}

/**
 * `(fn)` or `(options, fn)` after the test text
 */
export type TestArgs<F> = [testFun: F] | [options: TestOptions, testFun: F];

export function splitTestArgs<F>(args: TestArgs<F>): { readonly options: TestOptions; readonly testFun: F } {
  return args.length === 1 ? { options: {}, testFun: args[0] } : { options: args[0], testFun: args[1] };
}

/**
 * Message for a clause used where the style forbids it
 */
export function misplacedClause(clause: string, enclosing: string): string {
  return clause === enclosing
    ? `${withArticle(clause)} clause may not appear inside another ${enclosing} clause.`
    : `${withArticle(clause)} clause may not appear inside ${withArticle(enclosing).toLowerCase()} clause.`;
}

function withArticle(word: string): string {
  return /^[aeiou]/i.test(word) ? `An ${word}` : `A ${word}`;
}
