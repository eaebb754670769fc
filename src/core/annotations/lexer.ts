/**
 * Annotation lexer.
 *
 * Finds `@acp:` comment blocks independent of the host grammar, then splits
 * each block into directive lines and applies trailing provenance groups.
 */
import { classifyLines, indentOf, type CommentSyntax } from './comment-syntax.js';
import { lookupNamespace, PROVENANCE_NAMESPACES } from './namespaces.js';
import type { AnnotationBlock, AnnotationRecord, BlockLine, LineSpan, RawBlock } from './types.js';
import type { ValidationMode } from '../config/schema.js';
import { createDiagnostic, type Diagnostic } from '../diagnostics/types.js';
import {
  DEFAULT_REVIEW_THRESHOLD,
  explicitProvenance,
  resolveProvenance,
  type ProvenanceLine,
} from '../provenance/resolver.js';
import { AnnotationError, ErrorCodes } from '../../utils/errors.js';

export const SIGIL = '@acp:';

const HEADER_PATTERN = /^@acp:([\w-]+)(?::([\w-]+))?(?=\s|$)(.*)$/;
const PARAMETER_PATTERN = /"([^"]*)"|(\S+)/g;

export interface LexerOptions {
  file: string;
  mode: ValidationMode;
  reviewThreshold?: number;
  customNamespaces?: ReadonlySet<string>;
}

export interface LexResult {
  blocks: AnnotationBlock[];
  diagnostics: Diagnostic[];
}

/**
 * Lazily yield candidate blocks: a directive comment line followed by
 * contiguous directive lines and continuation lines indented deeper than
 * the first directive.
 */
export function* lexBlocks(text: string, syntax: CommentSyntax): Generator<RawBlock> {
  let current: BlockLine[] = [];
  let baseIndent = 0;

  const flush = (): RawBlock | null => {
    if (current.length === 0) return null;
    const lines = current;
    current = [];
    const first = lines[0];
    const last = lines[lines.length - 1];
    if (!first || !last) return null;
    return {
      lineSpan: { start: first.line, end: last.line },
      rawText: lines.map((l) => l.body.trim()).join('\n'),
      lines,
    };
  };

  for (const classified of classifyLines(text, syntax)) {
    const body = classified.body;
    const isDirective = body !== null && body.trimStart().startsWith(SIGIL);

    if (current.length > 0) {
      if (isDirective) {
        current.push({ line: classified.line, body, indent: indentOf(body), isDirective: true });
        continue;
      }
      if (body !== null && body.trim().length > 0 && indentOf(body) > baseIndent) {
        current.push({ line: classified.line, body, indent: indentOf(body), isDirective: false });
        continue;
      }
      const block = flush();
      if (block) yield block;
    }

    if (isDirective) {
      baseIndent = indentOf(body);
      current.push({ line: classified.line, body, indent: baseIndent, isDirective: true });
    }
  }

  const block = flush();
  if (block) yield block;
}

interface DirectiveLine {
  namespace: string;
  subNamespace?: string;
  paramText: string;
  parameters: string[];
  value: string;
  directive: string;
  lineSpan: LineSpan;
}

/**
 * Split a directive line into header, parameters and directive text.
 * Returns null when the line has no valid `@acp:<namespace>` header.
 */
export function parseDirectiveLine(body: string, line: number): DirectiveLine | null {
  const match = HEADER_PATTERN.exec(body.trim());
  if (!match) return null;
  const [, namespace = '', subNamespace, rest = ''] = match;
  const { paramText, directive } = splitDirective(rest);
  return {
    namespace,
    ...(subNamespace !== undefined ? { subNamespace } : {}),
    paramText,
    parameters: tokenizeParameters(paramText),
    value: unquote(paramText.trim()),
    directive,
    lineSpan: { start: line, end: line },
  };
}

/**
 * The directive starts at the first standalone `-` outside double quotes.
 */
function splitDirective(rest: string): { paramText: string; directive: string } {
  let inQuote = false;
  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i];
    if (ch === '"') {
      inQuote = !inQuote;
      continue;
    }
    if (inQuote || ch !== '-') continue;
    const before = i === 0 ? ' ' : rest[i - 1] ?? ' ';
    const after = i + 1 >= rest.length ? ' ' : rest[i + 1] ?? ' ';
    if (/\s/.test(before) && /\s/.test(after)) {
      return { paramText: rest.slice(0, i).trim(), directive: rest.slice(i + 1).trim() };
    }
  }
  return { paramText: rest.trim(), directive: '' };
}

export function tokenizeParameters(paramText: string): string[] {
  const parameters: string[] = [];
  for (const match of paramText.matchAll(PARAMETER_PATTERN)) {
    parameters.push(match[1] ?? match[2] ?? '');
  }
  return parameters;
}

function unquote(text: string): string {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? text.slice(1, -1) : text;
}

type BlockItem =
  | { kind: 'directive'; line: DirectiveLine }
  | { kind: 'provenance'; line: DirectiveLine };

/**
 * Parse one raw block into annotation records.
 *
 * In strict mode the first malformed line throws an AnnotationError; in
 * permissive mode it is reported and skipped.
 */
export function parseBlock(block: RawBlock, options: LexerOptions): { block: AnnotationBlock; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const customNamespaces = options.customNamespaces ?? new Set<string>();
  const strict = options.mode === 'strict';

  const reject = (span: LineSpan, message: string): void => {
    if (strict) {
      throw new AnnotationError(ErrorCodes.MALFORMED_ANNOTATION, message, {
        file: options.file,
        line: span.start,
        endLine: span.end,
      });
    }
    diagnostics.push(
      createDiagnostic('MalformedAnnotation', { file: options.file, line: span.start, endLine: span.end }, message)
    );
  };

  // Group physical lines into logical directive lines with their continuations.
  const items: BlockItem[] = [];
  let last: DirectiveLine | null = null;
  for (const blockLine of block.lines) {
    if (!blockLine.isDirective) {
      if (last) {
        const text = blockLine.body.trim();
        last.directive = last.directive ? `${last.directive} ${text}` : text;
        last.lineSpan.end = blockLine.line;
      }
      continue;
    }
    const parsed = parseDirectiveLine(blockLine.body, blockLine.line);
    if (!parsed) {
      last = null;
      reject({ start: blockLine.line, end: blockLine.line }, `Malformed annotation header: ${blockLine.body.trim()}`);
      continue;
    }
    last = parsed;
    items.push({ kind: PROVENANCE_NAMESPACES.has(parsed.namespace) ? 'provenance' : 'directive', line: parsed });
  }

  const annotations: AnnotationRecord[] = [];
  let pending: AnnotationRecord[] = [];
  let group: ProvenanceLine[] = [];

  const applyGroup = (): void => {
    if (group.length === 0) return;
    const firstLine = group[0]?.line ?? block.lineSpan.start;
    if (pending.length === 0) {
      diagnostics.push(
        createDiagnostic(
          'InvalidProvenance',
          { file: options.file, line: firstLine },
          'Provenance group does not follow any annotation'
        )
      );
    } else {
      const resolved = resolveProvenance(group, {
        file: options.file,
        mode: options.mode,
        reviewThreshold: options.reviewThreshold ?? DEFAULT_REVIEW_THRESHOLD,
      });
      diagnostics.push(...resolved.diagnostics);
      for (const record of pending) {
        record.provenance = { ...resolved.provenance };
      }
    }
    pending = [];
    group = [];
  };

  for (const item of items) {
    const line = item.line;
    if (item.kind === 'provenance') {
      group.push({ namespace: line.namespace, parameters: line.parameters, value: line.value, line: line.lineSpan.start });
      continue;
    }
    applyGroup();

    const spec = lookupNamespace(line.namespace, customNamespaces);
    if (!spec) {
      reject(line.lineSpan, `Unknown annotation namespace "${line.namespace}"`);
      continue;
    }
    const payload = spec.parse(line.parameters, line.value, line.directive);
    if (!payload.ok) {
      reject(line.lineSpan, `Invalid @acp:${line.namespace} annotation: ${payload.message}`);
      continue;
    }

    let directive = line.directive;
    let autoGenerated = false;
    if (!directive && spec.requiresDirective) {
      if (strict) {
        reject(line.lineSpan, `@acp:${line.namespace} requires directive text after " - "`);
        continue;
      }
      directive = spec.defaultDirective?.(payload.payload) ?? '';
      autoGenerated = true;
    }

    const record: AnnotationRecord = {
      namespace: line.namespace,
      ...(line.subNamespace !== undefined ? { subNamespace: line.subNamespace } : {}),
      parameters: line.parameters,
      value: line.value,
      directive,
      lineSpan: { ...line.lineSpan },
      provenance: explicitProvenance(),
      payload: payload.payload,
      ...(autoGenerated ? { autoGenerated: true as const } : {}),
    };
    annotations.push(record);
    pending.push(record);
  }
  applyGroup();

  return { block: { lineSpan: block.lineSpan, annotations }, diagnostics };
}

/**
 * Lex and parse every annotation block of a file. Blocks whose lines were all
 * rejected are dropped.
 */
export function parseAnnotations(text: string, syntax: CommentSyntax, options: LexerOptions): LexResult {
  const blocks: AnnotationBlock[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const raw of lexBlocks(text, syntax)) {
    const parsed = parseBlock(raw, options);
    diagnostics.push(...parsed.diagnostics);
    if (parsed.block.annotations.length > 0) {
      blocks.push(parsed.block);
    }
  }

  return { blocks, diagnostics };
}
