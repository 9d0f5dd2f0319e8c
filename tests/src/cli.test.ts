import { createProgram } from '@reqline/core';
import type { ProgramOutput } from '@reqline/core';
import { describe, it, expect } from 'vitest';

/**
 * Runs `reqline` with the given arguments against a captured output and an
 * explicit environment.
 */
function run(args: string[], env: NodeJS.ProcessEnv = {}): string[] {
  const lines: string[] = [];
  const output: ProgramOutput = { write: (text) => lines.push(text) };
  const program = createProgram(output, env);

  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride().configureOutput({ writeErr: () => undefined });
  }

  program.parse(args, { from: 'user' });
  return lines;
}

describe('reqline resolve', () => {
  it('prints the expanded URI', () => {
    const lines = run([
      'resolve',
      '{+baseurl}/users/{id}{?active}',
      '-p',
      'baseurl=https://api.example.com',
      '-p',
      'id=42',
      '-q',
      'active=true',
    ]);

    expect(lines).toEqual(['https://api.example.com/users/42?active=true\n']);
  });

  it('prints the request as JSON', () => {
    const lines = run([
      'resolve',
      '/users/{id}',
      '-p',
      'id=7',
      '-X',
      'delete',
      '-H',
      'Accept=application/json',
      '--json',
    ]);

    expect(lines).toEqual([
      `${JSON.stringify(
        { method: 'DELETE', uri: '/users/7', headers: { Accept: 'application/json' } },
        null,
        2,
      )}\n`,
    ]);
  });

  it('takes the base URL from the environment', () => {
    const lines = run(['resolve', '{+baseurl}/status'], {
      REQLINE_BASE_URL: 'https://env.example.com/',
    });

    expect(lines).toEqual(['https://env.example.com/status\n']);
  });

  it('uses the raw URL instead of the template', () => {
    const lines = run(['resolve', '/ignored/{id}', '--raw-url', 'https://raw.example.com/x?y=1']);

    expect(lines).toEqual(['https://raw.example.com/x?y=1\n']);
  });

  it('reports a missing baseurl as a usage error', () => {
    expect(() => run(['resolve', '{+baseurl}/users'])).toThrow(
      'InvalidArgumentError: pathParameters must contain a value for "baseurl" for the url to be built.',
    );
  });

  it('rejects parameters that are not key=value', () => {
    expect(() => run(['resolve', '/users/{id}', '-p', 'oops'])).toThrow(
      '--path must be KEY=VALUE (got “oops”)',
    );
  });
});
