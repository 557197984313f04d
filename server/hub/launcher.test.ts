import { describe, expect, it } from 'vitest';
import { buildLaunchArgs, exitCodeOf } from './launcher';
import type { ModelSpec } from './types';

const base: ModelSpec = {
  name:       'alpha',
  modelPath:  '/models/alpha',
  host:       '127.0.0.1',
  port:       null,
  jitEnabled: false,
  group:      null,
  options:    [],
};

describe('buildLaunchArgs', () => {
  it('puts identity flags first', () => {
    expect(buildLaunchArgs(base, 5005)).toEqual([
      '--model-path', '/models/alpha', '--host', '127.0.0.1', '--port', '5005',
    ]);
  });

  it('renders options in order as kebab-case flags', () => {
    const spec: ModelSpec = {
      ...base,
      options: [
        ['context_length', 8192],
        ['trust_remote_code', true],
        ['disable_auto_resize', false],
        ['chat_template', null],
        ['lora_paths', ['/l/one', '/l/two']],
        ['lora_scales', []],
        ['model_type', 'lm'],
      ],
    };

    expect(buildLaunchArgs(spec, 6001).slice(6)).toEqual([
      '--context-length', '8192',
      '--trust-remote-code',
      '--lora-paths', '/l/one,/l/two',
      '--model-type', 'lm',
    ]);
  });
});

describe('exitCodeOf', () => {
  it('keeps a normal exit code', () => {
    expect(exitCodeOf(0, null)).toBe(0);
    expect(exitCodeOf(3, null)).toBe(3);
  });

  it('records signal deaths as the negative signal number', () => {
    expect(exitCodeOf(null, 'SIGTERM')).toBe(-15);
    expect(exitCodeOf(null, 'SIGKILL')).toBe(-9);
  });

  it('falls back to -1 when neither is known', () => {
    expect(exitCodeOf(null, null)).toBe(-1);
  });
});
