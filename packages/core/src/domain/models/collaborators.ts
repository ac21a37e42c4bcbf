/** Current time source, injected so timestamps can be pinned in tests. */
export type Clock = () => Date;

/** Produces a fresh id that has never been handed out before. */
export type IdGenerator = () => string;

/** Returns a float in [0, 1), like `Math.random`. */
export type RandomSource = () => number;

export interface BrowserOpener {
  /** Opens the URL in the user's browser; rejects when the launch fails. */
  open(url: string): Promise<void>;
}
