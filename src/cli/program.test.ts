import { readFileSync } from 'fs';
import { describe, expect, test } from 'vitest';
import { createProgram } from './program';

describe('createProgram', () => {
  test('reports the version from package.json', () => {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));

    expect(pkg).toHaveProperty('version', createProgram().version());
  });

  test('registers the apply, login and config commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['apply', 'login', 'config']);
  });
});
