import { describe, it, expect, vi } from 'vitest';
import { runBounded, trimPartialUtf8 } from '@/lib/process.js';

const NODE = process.execPath;

describe('runBounded', () => {
  it('should capture output and the exit code', async () => {
    const result = await runBounded(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'], {
      timeoutMs: 10_000,
      maxOutputBytes: 1024,
    });

    expect(result).toMatchObject({
      exit_code: 3,
      stdout: 'out',
      stderr: 'err',
      stdout_truncated: false,
      timed_out: false,
      spawn_error: null,
    });
  });

  it('should pass arguments without a shell', async () => {
    const result = await runBounded(NODE, ['-e', 'process.stdout.write(process.argv[1])', '$(echo no) ; x'], {
      timeoutMs: 10_000,
      maxOutputBytes: 1024,
    });

    expect(result.stdout).toBe('$(echo no) ; x');
  });

  it('should feed input on stdin', async () => {
    const script = 'let s = ""; process.stdin.on("data", (d) => (s += d)); process.stdin.on("end", () => process.stdout.write(s.toUpperCase()));';

    const result = await runBounded(NODE, ['-e', script], { timeoutMs: 10_000, maxOutputBytes: 1024, input: 'hello' });

    expect(result.stdout).toBe('HELLO');
  });

  it('should truncate output past the byte cap', async () => {
    const result = await runBounded(NODE, ['-e', 'process.stdout.write("x".repeat(100))'], {
      timeoutMs: 10_000,
      maxOutputBytes: 10,
    });

    expect(result.stdout).toBe('x'.repeat(10));
    expect(result.stdout_truncated).toBe(true);
  });

  it('should not split a multi-byte character at the byte cap', async () => {
    const result = await runBounded(NODE, ['-e', 'process.stdout.write("a\\u00e9b")'], {
      timeoutMs: 10_000,
      maxOutputBytes: 2,
    });

    expect(result.stdout).toBe('a');
    expect(result.stdout_truncated).toBe(true);
  });

  it('should kill on timeout after running the hook', async () => {
    const onTimeout = vi.fn(async () => undefined);

    const result = await runBounded(NODE, ['-e', 'setTimeout(() => {}, 30000)'], {
      timeoutMs: 200,
      maxOutputBytes: 1024,
      onTimeout,
    });

    expect(result.timed_out).toBe(true);
    expect(result.exit_code).toBe(124);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should report a program that cannot be started', async () => {
    const result = await runBounded('taskforge-no-such-program', [], { timeoutMs: 1000, maxOutputBytes: 1024 });

    expect(result.exit_code).toBe(127);
    expect(result.spawn_error).toContain('ENOENT');
  });
});

describe('trimPartialUtf8', () => {
  it('should drop an incomplete trailing sequence', () => {
    const euro = Buffer.from('\u20ac', 'utf-8');

    expect(trimPartialUtf8(Buffer.concat([Buffer.from('ab'), euro.subarray(0, 2)])).toString('utf-8')).toBe('ab');
    expect(trimPartialUtf8(Buffer.concat([Buffer.from('ab'), euro])).toString('utf-8')).toBe('ab\u20ac');
  });

  it('should leave ASCII alone', () => {
    expect(trimPartialUtf8(Buffer.from('plain')).toString('utf-8')).toBe('plain');
    expect(trimPartialUtf8(Buffer.alloc(0))).toHaveLength(0);
  });
});
