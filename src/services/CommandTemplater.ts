/**
 * @file CommandTemplater - Editor and build command expansion
 * @description Turns "vim %f +%l" style templates into argument lists
 * @depends errors
 */

// ====== Design Notes ======
// Placeholders: %f file, %l line, %c column, %% literal percent. Any other
// '%' (a date format, "100%") is passed through untouched.
// Substitution happens per argument, so a path with spaces stays one argument
// and nothing is ever handed to a shell.

import { TemplateError } from './errors';
import type {
  ColumnFallback,
  CommandTemplate,
  ICommandTemplater,
  TemplateValues,
} from './interfaces';

const PLACEHOLDER_PATTERN = /%([flc%])/g;

export interface CommandTemplaterOptions {
  columnFallback?: ColumnFallback;
}

export class CommandTemplater implements ICommandTemplater {
  private readonly columnFallback: ColumnFallback;

  constructor(options: CommandTemplaterOptions = {}) {
    this.columnFallback = options.columnFallback ?? 'error';
  }

  validate(template: CommandTemplate): void {
    if (template.length === 0) {
      throw new TemplateError('Command template is empty', template);
    }
  }

  expand(template: CommandTemplate, values: TemplateValues): string[] {
    this.validate(template);

    const dropColumnTokens = values.column === undefined && this.columnFallback === 'omit';
    const args: string[] = [];

    for (const token of template) {
      if (dropColumnTokens && mentionsPlaceholder(token, 'c')) {
        continue;
      }
      args.push(
        token.replace(PLACEHOLDER_PATTERN, (_match, name: string) =>
          this.substitute(name, values, template)
        )
      );
    }

    return args;
  }

  private substitute(name: string, values: TemplateValues, template: CommandTemplate): string {
    switch (name) {
      case 'f':
        if (!values.file) {
          throw new TemplateError('Template uses %f but no source file is known', template);
        }
        return values.file;
      case 'l':
        if (values.line === undefined) {
          throw new TemplateError('Template uses %l but no line number is known', template);
        }
        return values.line.toString(10);
      case 'c':
        if (values.column !== undefined) {
          return values.column.toString(10);
        }
        if (typeof this.columnFallback === 'number') {
          return this.columnFallback.toString(10);
        }
        throw new TemplateError(
          'Template uses %c but the viewer supplied no column (set editor.columnFallback)',
          template
        );
      default:
        return '%';
    }
  }
}

function mentionsPlaceholder(token: string, name: string): boolean {
  for (const match of token.matchAll(PLACEHOLDER_PATTERN)) {
    if (match[1] === name) {
      return true;
    }
  }
  return false;
}

// ====== Parsing ======

/**
 * Split a command line into arguments the way a POSIX shell would for plain
 * words: whitespace separates, '…' is literal, "…" honours \" and \\, and a
 * backslash outside quotes escapes the next character.
 *
 * @throws {TemplateError} on an unterminated quote or trailing backslash
 */
export function parseCommandTemplate(input: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let i = 0;

  const fail = (reason: string): never => {
    throw new TemplateError(`Cannot parse command "${input}": ${reason}`, [input]);
  };

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
      i++;
      continue;
    }

    inToken = true;

    if (ch === "'") {
      const end = input.indexOf("'", i + 1);
      if (end === -1) fail('unterminated single quote');
      current += input.slice(i + 1, end);
      i = end + 1;
    } else if (ch === '"') {
      i++;
      for (;;) {
        if (i >= input.length) fail('unterminated double quote');
        const inner = input[i];
        if (inner === '"') {
          i++;
          break;
        }
        if (inner === '\\' && (input[i + 1] === '"' || input[i + 1] === '\\')) {
          current += input[i + 1];
          i += 2;
          continue;
        }
        current += inner;
        i++;
      }
    } else if (ch === '\\') {
      if (i + 1 >= input.length) fail('trailing backslash');
      current += input[i + 1];
      i += 2;
    } else {
      current += ch;
      i++;
    }
  }

  if (inToken) {
    args.push(current);
  }

  return args;
}

export function createCommandTemplater(options?: CommandTemplaterOptions): ICommandTemplater {
  return new CommandTemplater(options);
}
