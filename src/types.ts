/**
 * Shared type definitions.
 */

/** Minimal logger surface every component depends on. */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}
