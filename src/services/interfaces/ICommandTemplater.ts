/**
 * @file ICommandTemplater - Command template contract
 * @description Expands %f / %l / %c placeholders into a concrete argument list
 */

// ====== Type Definitions ======

/** Argument tokens, some containing placeholders. */
export type CommandTemplate = readonly string[];

/**
 * Values available for substitution.
 * A Source Location always satisfies this shape.
 */
export interface TemplateValues {
  /** Absolute source file path (%f). */
  file?: string;
  /** Line number, 1-based (%l). */
  line?: number;
  /** Column number, 1-based (%c). */
  column?: number;
}

/**
 * What to do when %c is used but no column is known:
 * - 'error': fail with TemplateError
 * - 'omit': leave out every argument that mentions %c
 * - number: substitute that number
 */
export type ColumnFallback = 'error' | 'omit' | number;

// ====== Interface Definition ======

export interface ICommandTemplater {
  /**
   * @throws {TemplateError} when the template has no arguments
   */
  validate(template: CommandTemplate): void;

  /**
   * @throws {TemplateError} when a referenced value is missing and has no fallback
   */
  expand(template: CommandTemplate, values: TemplateValues): string[];
}
