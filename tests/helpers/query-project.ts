/**
 * A small indexed project shared by the query tests.
 */
export const QUERY_SOURCES: Record<string, string> = {
  'src/auth.ts': [
    '// @acp:lock restricted - Security review required',
    '',
    '// @acp:lock frozen - MUST NOT change token format',
    '// @acp:summary "Validate a session token"',
    'export function validateToken(t: string): boolean {',
    '  return check(t);',
    '}',
    '',
    'export function check(t: string): boolean {',
    '  return t.length > 0;',
    '}',
    '',
  ].join('\n'),
  'src/forms.ts': [
    '// @acp:domain validation',
    '',
    'export function validateEmail(v: string): boolean {',
    "  return v.includes('@');",
    '}',
    '',
    'export function validateName(v: string): boolean {',
    '  return v.length > 0;',
    '}',
    '',
    'export class Form {',
    '  validate(): boolean {',
    "    return validateEmail('x');",
    '  }',
    '}',
    '',
  ].join('\n'),
  'src/legacy.ts': 'export function check(): void {}\n',
};
