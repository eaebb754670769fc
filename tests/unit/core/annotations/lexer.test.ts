/**
 * Tests for the annotation lexer.
 */
import { describe, it, expect } from 'vitest';
import {
  lexBlocks,
  parseAnnotations,
  parseDirectiveLine,
  tokenizeParameters,
} from '../../../../src/core/annotations/lexer.js';
import { C_STYLE_SYNTAX, HASH_SYNTAX } from '../../../../src/core/annotations/comment-syntax.js';
import { AnnotationError, ErrorCodes } from '../../../../src/utils/errors.js';

const permissive = { file: 'src/a.ts', mode: 'permissive' as const };
const strict = { file: 'src/a.ts', mode: 'strict' as const };

describe('parseDirectiveLine', () => {
  it('should split namespace, parameters and directive', () => {
    expect(parseDirectiveLine(' @acp:lock frozen - MUST NOT modify', 3)).toEqual({
      namespace: 'lock',
      paramText: 'frozen',
      parameters: ['frozen'],
      value: 'frozen',
      directive: 'MUST NOT modify',
      lineSpan: { start: 3, end: 3 },
    });
  });

  it('should read a sub-namespace', () => {
    expect(parseDirectiveLine('@acp:x-team:backend alpha', 1)?.subNamespace).toBe('backend');
  });

  it('should ignore dashes inside quotes and words', () => {
    const parsed = parseDirectiveLine('@acp:hack ticket=T-1 "temp fix - upstream bug" - remove later', 1);

    expect(parsed?.paramText).toBe('ticket=T-1 "temp fix - upstream bug"');
    expect(parsed?.directive).toBe('remove later');
  });

  it('should strip quotes from a fully quoted value', () => {
    expect(parseDirectiveLine('@acp:summary "Parses files"', 1)?.value).toBe('Parses files');
  });

  it('should return null without a namespace', () => {
    expect(parseDirectiveLine('@acp: broken', 1)).toBeNull();
  });
});

describe('tokenizeParameters', () => {
  it('should keep quoted parameters together', () => {
    expect(tokenizeParameters('a "b c" d')).toEqual(['a', 'b c', 'd']);
  });
});

describe('lexBlocks', () => {
  it('should yield one block per run of directive lines', () => {
    const text = ['// @acp:module auth', '// @acp:owner team-a', 'const x = 1;', '// @acp:todo - later'].join('\n');

    const blocks = [...lexBlocks(text, C_STYLE_SYNTAX)];

    expect(blocks.map((block) => block.lineSpan)).toEqual([
      { start: 1, end: 2 },
      { start: 4, end: 4 },
    ]);
  });

  it('should attach deeper-indented continuation lines', () => {
    const text = ['// @acp:lock restricted - ask first', '//   and wait for approval', '// unrelated'].join('\n');

    const [block] = [...lexBlocks(text, C_STYLE_SYNTAX)];

    expect(block?.lineSpan).toEqual({ start: 1, end: 2 });
  });

  it('should ignore comments without the sigil', () => {
    expect([...lexBlocks('// plain comment\n# not a comment here\n', C_STYLE_SYNTAX)]).toEqual([]);
  });
});

describe('parseAnnotations', () => {
  it('should parse a lock annotation', () => {
    const { blocks, diagnostics } = parseAnnotations('// @acp:lock frozen - MUST NOT modify\n', C_STYLE_SYNTAX, permissive);

    expect(diagnostics).toEqual([]);
    expect(blocks).toEqual([
      {
        lineSpan: { start: 1, end: 1 },
        annotations: [
          {
            namespace: 'lock',
            parameters: ['frozen'],
            value: 'frozen',
            directive: 'MUST NOT modify',
            lineSpan: { start: 1, end: 1 },
            provenance: { origin: 'explicit', reviewed: false, needsReview: false },
            payload: { kind: 'lock', level: 'frozen' },
          },
        ],
      },
    ]);
  });

  it('should join continuation lines into the directive', () => {
    const text = '// @acp:lock restricted - ask first\n//   and wait for approval\n';

    const [record] = parseAnnotations(text, C_STYLE_SYNTAX, permissive).blocks[0]?.annotations ?? [];

    expect(record?.directive).toBe('ask first and wait for approval');
    expect(record?.lineSpan).toEqual({ start: 1, end: 2 });
  });

  it('should apply a trailing provenance group', () => {
    const text = [
      '/**',
      ' * @acp:ref https://x - consult',
      ' * @acp:source heuristic',
      ' * @acp:source-confidence 0.6',
      ' */',
    ].join('\n');

    const { blocks, diagnostics } = parseAnnotations(text, C_STYLE_SYNTAX, permissive);

    expect(diagnostics).toEqual([]);
    expect(blocks[0]?.lineSpan).toEqual({ start: 2, end: 4 });
    expect(blocks[0]?.annotations).toHaveLength(1);
    expect(blocks[0]?.annotations[0]?.payload).toEqual({ kind: 'ref', url: 'https://x' });
    expect(blocks[0]?.annotations[0]?.provenance).toEqual({
      origin: 'heuristic',
      confidence: 0.6,
      reviewed: false,
      needsReview: true,
    });
  });

  it('should apply a provenance group only to the annotations before it', () => {
    const text = [
      '// @acp:summary Handles login',
      '// @acp:source inferred',
      '// @acp:source-reviewed true',
      '// @acp:domain auth',
    ].join('\n');

    const annotations = parseAnnotations(text, C_STYLE_SYNTAX, permissive).blocks[0]?.annotations ?? [];

    expect(annotations.map((record) => [record.namespace, record.provenance.origin, record.provenance.needsReview])).toEqual([
      ['summary', 'inferred', false],
      ['domain', 'explicit', false],
    ]);
  });

  it('should fill in the default directive in permissive mode', () => {
    const [record] = parseAnnotations('// @acp:todo\n', C_STYLE_SYNTAX, permissive).blocks[0]?.annotations ?? [];

    expect(record?.directive).toBe('Pending work item - address before release');
    expect(record?.autoGenerated).toBe(true);
    expect(record?.payload).toEqual({ kind: 'note' });
  });

  it('should reject a missing directive in strict mode', () => {
    expect(() => parseAnnotations('// @acp:todo\n', C_STYLE_SYNTAX, strict)).toThrow(AnnotationError);
  });

  it('should not require directives for descriptive namespaces', () => {
    const { blocks, diagnostics } = parseAnnotations('# @acp:summary "Parses files"\n', HASH_SYNTAX, strict);

    expect(diagnostics).toEqual([]);
    expect(blocks[0]?.annotations[0]?.payload).toEqual({ kind: 'text', text: 'Parses files' });
    expect(blocks[0]?.annotations[0]?.directive).toBe('');
  });

  it('should report unknown namespaces and keep the rest of the block', () => {
    const text = '// @acp:bogus x - y\n// @acp:domain billing\n';

    const { blocks, diagnostics } = parseAnnotations(text, C_STYLE_SYNTAX, permissive);

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      kind: 'MalformedAnnotation',
      code: ErrorCodes.MALFORMED_ANNOTATION,
      location: { file: 'src/a.ts', line: 1, endLine: 1 },
      message: 'Unknown annotation namespace "bogus"',
    });
    expect(blocks[0]?.annotations.map((record) => record.namespace)).toEqual(['domain']);
  });

  it('should accept x- prefixed and configured custom namespaces', () => {
    const text = '// @acp:x-team alpha - ping first\n// @acp:review weekly\n';

    const { blocks, diagnostics } = parseAnnotations(text, C_STYLE_SYNTAX, {
      ...permissive,
      customNamespaces: new Set(['review']),
    });

    expect(diagnostics).toEqual([]);
    expect(blocks[0]?.annotations.map((record) => record.payload)).toEqual([
      { kind: 'custom', rawParameters: 'alpha' },
      { kind: 'custom', rawParameters: 'weekly' },
    ]);
  });

  it('should drop a block whose only line is malformed', () => {
    const { blocks, diagnostics } = parseAnnotations('// @acp: broken\n', C_STYLE_SYNTAX, permissive);

    expect(blocks).toEqual([]);
    expect(diagnostics[0]?.message).toBe('Malformed annotation header: @acp: broken');
  });

  it('should report a provenance group with nothing to annotate', () => {
    const { blocks, diagnostics } = parseAnnotations('// @acp:source heuristic\n', C_STYLE_SYNTAX, permissive);

    expect(blocks).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.kind).toBe('InvalidProvenance');
  });

  it('should throw with location details in strict mode', () => {
    try {
      parseAnnotations('\n// @acp:lock sideways - nope\n', C_STYLE_SYNTAX, strict);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AnnotationError);
      if (error instanceof AnnotationError) {
        expect(error.details).toEqual({ file: 'src/a.ts', line: 2, endLine: 2 });
      }
    }
  });

  it('should parse hack parameters', () => {
    const text = '// @acp:hack expires=2025-01-01 ticket=T-1 "temp fix - upstream bug" - remove later\n';

    const [record] = parseAnnotations(text, C_STYLE_SYNTAX, permissive).blocks[0]?.annotations ?? [];

    expect(record?.payload).toEqual({
      kind: 'hack',
      expires: '2025-01-01',
      ticket: 'T-1',
      reason: 'temp fix - upstream bug',
    });
    expect(record?.directive).toBe('remove later');
  });
});
