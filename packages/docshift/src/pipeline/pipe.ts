/**
 * Step composition for page pipelines
 * @module pipeline/pipe
 */

/**
 * A pipeline step. May be synchronous or return a promise.
 */
export type Step<T> = (input: T) => T | Promise<T>;

/**
 * Chains steps so each one receives the previous step's output.
 * A rejected step rejects the chain; the steps after it never run.
 *
 * @example
 * const run = pipe<PageContext>(transformHighlightLines, transformExecPaths);
 * const result = await run(ctx);
 */
export function pipe<T>(...steps: Array<Step<T>>): (input: T) => Promise<T> {
  return (input) =>
    steps.reduce<Promise<T>>(async (previous, step) => step(await previous), Promise.resolve(input));
}

/**
 * Gates `step` on a flag, or on a predicate of the data it would receive.
 */
export function when<T>(condition: boolean | ((data: T) => boolean), step: Step<T>): Step<T> {
  if (typeof condition === 'boolean') {
    return condition ? step : (data) => data;
  }
  return (data) => (condition(data) ? step(data) : data);
}

/**
 * Wraps a side effect as a step that hands its input on unchanged,
 * once the side effect has settled.
 *
 * @example
 * const run = pipe(render, tap((html) => writeFile(out, html)));
 */
export function tap<T>(sideEffect: (data: T) => void | Promise<void>): (data: T) => Promise<T> {
  return async (data) => {
    await sideEffect(data);
    return data;
  };
}
