import { loadConfig, ConfigError, DEFAULT_MAX_CALL_DEPTH } from '../src/config';

function configIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({ maxCallDepth: DEFAULT_MAX_CALL_DEPTH, stackTrace: false });
    expect(DEFAULT_MAX_CALL_DEPTH).toBe(500);
  });

  test('reads both variables', () => {
    expect(loadConfig({ KUZUR_MAX_CALL_DEPTH: '25', KUZUR_STACK_TRACE: '1' })).toEqual({
      maxCallDepth: 25,
      stackTrace: true,
    });
    expect(loadConfig({ KUZUR_STACK_TRACE: 'false' }).stackTrace).toBe(false);
  });

  test('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/tmp', KUZUR_OTHER: 'x' }).maxCallDepth).toBe(DEFAULT_MAX_CALL_DEPTH);
  });

  test('rejects a non-numeric call depth', () => {
    expect(configIssues({ KUZUR_MAX_CALL_DEPTH: 'abc' })).toEqual(['KUZUR_MAX_CALL_DEPTH: must be a positive integer']);
  });

  test('rejects a zero call depth', () => {
    expect(configIssues({ KUZUR_MAX_CALL_DEPTH: '0' })).toEqual(['KUZUR_MAX_CALL_DEPTH: must be a positive integer']);
  });

  test('rejects an unknown flag value', () => {
    const issues = configIssues({ KUZUR_STACK_TRACE: 'yes' });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('KUZUR_STACK_TRACE: ')).toBe(true);
  });

  test('error message lists every issue', () => {
    expect(() => loadConfig({ KUZUR_MAX_CALL_DEPTH: '-1', KUZUR_STACK_TRACE: 'maybe' })).toThrow(
      /^Invalid configuration:\n {2}KUZUR_MAX_CALL_DEPTH: must be a positive integer\n {2}KUZUR_STACK_TRACE: /,
    );
  });
});
