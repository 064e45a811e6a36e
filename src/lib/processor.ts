// Path: src/lib/processor.ts
// Per-file pipeline: detect -> extract -> resolve -> replace -> emit

import fs from 'node:fs';
import path from 'node:path';
import { processorLogger as log } from './logger.js';
import type { SecretResolver } from './resolver.js';
import {
  detectFormat,
  describeFormat,
  extractTokens,
  formatToken,
  replaceAll,
  tokenKey,
  type DetectedFormat,
  type TemplateFormat,
  type TemplateToken,
} from './template/index.js';
import {
  BinaryFileError,
  InjectError,
  NotSignedInError,
  SecretNotFoundError,
  extractErrorMessage,
  wrapError,
} from '../utils/error.js';
import { getFileMode, isBinaryContent, writeAtomic } from '../utils/file.js';
import { DEFAULT_TEMPLATE_EXTENSIONS, hasTemplateExtension, stripTemplateExtension } from '../utils/path.js';

/** Stand-in for values in dry-run previews */
export const REDACTED = '********';

/** Output target meaning "write to the output stream" */
export const STDOUT_TARGET = '-';

/**
 * Anything with a write(string) method: process.stdout, a test collector...
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ProcessOptions {
  /** Force a grammar instead of detecting it (default: auto) */
  format?: TemplateFormat | 'auto';
  /** Vault for tokens that do not name one */
  vault?: string;
  /** Leave unresolved placeholders in place instead of failing */
  allowMissing?: boolean;
  /** Per-token trace on the diagnostics stream; dry-run previews show values */
  debug?: boolean;
  /** Bypass the lookup cache */
  useCache?: boolean;
}

export interface FileProcessOptions extends ProcessOptions {
  /** Explicit output path, or "-" for the output stream */
  output?: string;
  /** Preview without writing */
  dryRun?: boolean;
  /** Keep a .backup copy of a file that is about to be replaced */
  backup?: boolean;
  /** Extensions stripped to derive the output path */
  templateExtensions?: readonly string[];
  /** Batch only: also process files without a template extension */
  force?: boolean;
}

export interface ProcessingResult {
  /** Content with every resolved placeholder substituted */
  content: string;
  format: DetectedFormat;
  tokens: TemplateToken[];
  unresolved: TemplateToken[];
  warnings: string[];
  /** Path written, "-" for the output stream, undefined when nothing was written */
  output?: string;
}

export interface FileFailure {
  file: string;
  error: InjectError;
}

export interface FileSuccess {
  file: string;
  result: ProcessingResult;
}

export interface FileSkipped {
  file: string;
  /** No template extension and no `force`, or an earlier file found no session */
  reason: 'not-a-template' | 'not-signed-in';
}

export interface BatchSummary {
  succeeded: FileSuccess[];
  failed: FileFailure[];
  skipped: FileSkipped[];
}

interface Rendering {
  format: DetectedFormat;
  tokens: TemplateToken[];
  values: Map<string, string>;
  unresolved: TemplateToken[];
  warnings: string[];
}

export interface TemplateProcessorStreams {
  /** Rendered content and dry-run previews */
  out?: OutputSink;
  /** Debug trace; kept apart from rendered content */
  diagnostics?: OutputSink;
}

/**
 * Renders templates against a resolver and writes the results.
 */
export class TemplateProcessor {
  private readonly out: OutputSink;
  private readonly diagnostics: OutputSink;

  constructor(
    private readonly resolver: SecretResolver,
    streams: TemplateProcessorStreams = {}
  ) {
    this.out = streams.out ?? process.stdout;
    this.diagnostics = streams.diagnostics ?? process.stderr;
  }

  /**
   * Render template text without touching the filesystem.
   *
   * @throws SecretNotFoundError when a token is unresolved and allowMissing is off
   * @throws NotSignedInError regardless of allowMissing
   */
  async processContent(content: string, options: ProcessOptions = {}): Promise<ProcessingResult> {
    const rendering = await this.render(content, options);
    return {
      content: this.substitute(content, rendering, rendering.values),
      format: rendering.format,
      tokens: rendering.tokens,
      unresolved: rendering.unresolved,
      warnings: rendering.warnings,
    };
  }

  /**
   * Render one template file and emit the result.
   */
  async processFile(input: string, options: FileProcessOptions = {}): Promise<ProcessingResult> {
    const inputPath = path.resolve(input);
    const content = this.readTemplate(inputPath, input);
    return this.emit(content, input, this.outputTarget(inputPath, options), inputPath, options);
  }

  /**
   * Render template text read from a stream. The result goes to the output
   * stream unless an explicit output path is given.
   */
  async processStream(content: string, options: FileProcessOptions = {}): Promise<ProcessingResult> {
    const target = options.output && options.output !== STDOUT_TARGET ? path.resolve(options.output) : STDOUT_TARGET;
    return this.emit(content, 'stdin', target, undefined, options);
  }

  /**
   * Process several files; a failure aborts only its own file.
   *
   * Files without a template extension are skipped unless `force` is set.
   * A missing sign-in stops the batch: the files after it are skipped.
   */
  async processFiles(inputs: readonly string[], options: FileProcessOptions = {}): Promise<BatchSummary> {
    const summary: BatchSummary = { succeeded: [], failed: [], skipped: [] };
    const extensions = options.templateExtensions ?? DEFAULT_TEMPLATE_EXTENSIONS;

    for (let index = 0; index < inputs.length; index++) {
      const file = inputs[index];
      if (!options.force && !hasTemplateExtension(file, extensions)) {
        log.debug({ file }, 'Skipping file without a template extension');
        summary.skipped.push({ file, reason: 'not-a-template' });
        continue;
      }

      try {
        const result = await this.processFile(file, options);
        summary.succeeded.push({ file, result });
      } catch (err) {
        const error = wrapError(err, 'PROCESSING_FAILED', { file });
        log.warn({ file, code: error.code, reason: error.message }, 'Template failed');
        summary.failed.push({ file, error });

        if (error instanceof NotSignedInError) {
          for (const rest of inputs.slice(index + 1)) {
            summary.skipped.push({ file: rest, reason: 'not-signed-in' });
          }
          break;
        }
      }
    }

    return summary;
  }

  /**
   * Where a rendered template goes: explicit output, else the template path
   * without its template extension, else in place.
   */
  outputTarget(inputPath: string, options: FileProcessOptions): string {
    if (options.output === STDOUT_TARGET) {
      return STDOUT_TARGET;
    }
    if (options.output) {
      return path.resolve(options.output);
    }
    return stripTemplateExtension(inputPath, options.templateExtensions ?? DEFAULT_TEMPLATE_EXTENSIONS);
  }

  private readTemplate(inputPath: string, label: string): string {
    if (!fs.existsSync(inputPath) || !fs.statSync(inputPath).isFile()) {
      throw new InjectError(`Input file not found: ${label}`, 'INPUT_NOT_FOUND', { metadata: { file: label } });
    }
    const buffer = fs.readFileSync(inputPath);
    if (isBinaryContent(buffer)) {
      throw new BinaryFileError(label);
    }
    return buffer.toString('utf-8');
  }

  private async emit(
    content: string,
    label: string,
    target: string,
    inputPath: string | undefined,
    options: FileProcessOptions
  ): Promise<ProcessingResult> {
    const rendering = await this.render(content, options);
    const resolved = this.substitute(content, rendering, rendering.values);
    const result: ProcessingResult = {
      content: resolved,
      format: rendering.format,
      tokens: rendering.tokens,
      unresolved: rendering.unresolved,
      warnings: rendering.warnings,
    };

    if (options.dryRun) {
      const shown = options.debug
        ? resolved
        : this.substitute(content, rendering, new Map(Array.from(rendering.values.keys(), (key) => [key, REDACTED])));
      const targetLabel = target === STDOUT_TARGET ? 'stdout' : target;
      this.out.write(
        `[dry-run] ${label} -> ${targetLabel} (format: ${rendering.format}, ${rendering.tokens.length} token(s))\n`
      );
      this.out.write(shown.endsWith('\n') ? shown : `${shown}\n`);
      return result;
    }

    if (target === STDOUT_TARGET) {
      this.out.write(resolved);
      result.output = STDOUT_TARGET;
      return result;
    }

    if (rendering.format === 'none' && target === inputPath) {
      log.debug({ file: label }, 'No placeholders, left unchanged');
      return result;
    }

    const mode = getFileMode(target) ?? (inputPath ? getFileMode(inputPath) : undefined) ?? 0o600;
    writeAtomic(target, resolved, { mode, backup: options.backup ?? false });
    result.output = target;
    log.info({ file: label, output: target, tokens: rendering.tokens.length }, 'Template rendered');
    return result;
  }

  private substitute(content: string, rendering: Rendering, values: ReadonlyMap<string, string>): string {
    if (rendering.format === 'none') {
      return content;
    }
    return replaceAll(content, rendering.tokens, values, rendering.format);
  }

  private async render(content: string, options: ProcessOptions): Promise<Rendering> {
    const format: DetectedFormat =
      options.format && options.format !== 'auto' ? options.format : detectFormat(content);
    const rendering: Rendering = { format, tokens: [], values: new Map(), unresolved: [], warnings: [] };

    this.trace(options, `format: ${format} (${describeFormat(format)})`);
    if (format === 'none') {
      return rendering;
    }

    rendering.tokens = extractTokens(content, format);
    this.trace(options, `tokens: ${rendering.tokens.length}`);

    for (const token of rendering.tokens) {
      const vault = token.vault ?? options.vault ?? this.resolver.defaultVault;
      const field = token.field ?? this.resolver.defaultField;
      this.trace(options, `resolve ${token.identifier} (vault=${vault} field=${field})`);

      try {
        const record = await this.resolver.resolveDetailed(token.identifier, {
          vault,
          field,
          useCache: options.useCache,
          literal: true,
        });
        rendering.values.set(tokenKey(token), record.value);
        this.trace(options, `  ok ${token.identifier} from ${record.source}`);
      } catch (err) {
        if (err instanceof NotSignedInError) {
          throw err;
        }
        rendering.unresolved.push(token);
        this.trace(options, `  unresolved ${token.identifier}: ${extractErrorMessage(err)}`);
      }
    }

    if (rendering.unresolved.length > 0) {
      const names = rendering.unresolved.map(formatToken);
      if (!options.allowMissing) {
        throw new SecretNotFoundError(names);
      }
      for (const name of names) {
        rendering.warnings.push(`Unresolved placeholder left in place: ${name}`);
      }
    }

    return rendering;
  }

  private trace(options: ProcessOptions, line: string): void {
    if (options.debug) {
      this.diagnostics.write(`[debug] ${line}\n`);
    }
  }
}

function carriesPlaceholders(file: string): boolean {
  const buffer = fs.readFileSync(file);
  return !isBinaryContent(buffer) && detectFormat(buffer.toString('utf-8')) !== 'none';
}

/**
 * Recursively collect template files under a directory, sorted by path.
 * With `includeDetected`, text files whose content carries placeholders are
 * collected as well.
 */
export function collectTemplates(
  dir: string,
  extensions: readonly string[] = DEFAULT_TEMPLATE_EXTENSIONS,
  includeDetected = false
): string[] {
  const found: string[] = [];
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (!entry.isFile()) {
        continue;
      } else if (hasTemplateExtension(entry.name, extensions) || (includeDetected && carriesPlaceholders(full))) {
        found.push(full);
      }
    }
  };
  walk(dir);
  return found.sort();
}
