import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  leadingToken,
  sanitizeCommand,
  SecurityValidator,
  splitShellWords,
  structuralWarnings,
} from '@/lib/security.js';
import { DEFAULT_CONFIG } from '@/lib/config.js';
import { FatalModelError } from '@/types/model.js';
import { commandKind, createTask, FakeAnalyzer, silenceConsole } from '../helpers/mocks.js';

const task = createTask({ kind: commandKind('pip install flask', 'dependency_install') });

function validator(
  analyzer: FakeAnalyzer | null,
  overrides: { command_whitelist?: string[]; security_level?: 'strict' | 'permissive' } = {}
): SecurityValidator {
  return new SecurityValidator(
    {
      command_whitelist: overrides.command_whitelist ?? DEFAULT_CONFIG.command_whitelist,
      pattern_blacklist: DEFAULT_CONFIG.pattern_blacklist,
      security_level: overrides.security_level ?? 'strict',
    },
    analyzer
  );
}

describe('sanitizeCommand', () => {
  it('should strip control characters and collapse whitespace', () => {
    expect(sanitizeCommand('  ls\t\t-la\x00\n')).toBe('ls -la');
  });
});

describe('splitShellWords', () => {
  it('should honour quotes and escapes', () => {
    expect(splitShellWords(`echo "a b" 'c d' e\\ f`)).toEqual(['echo', 'a b', 'c d', 'e f']);
  });

  it('should return null for an open quote', () => {
    expect(splitShellWords('echo "unterminated')).toBeNull();
  });
});

describe('leadingToken', () => {
  it('should accept a bare program name', () => {
    expect(leadingToken('python -m pytest')).toEqual({ ok: true, token: 'python' });
  });

  it('should reject a program given with a path', () => {
    expect(leadingToken('/bin/ls -la')).toEqual({
      ok: false,
      reason: "program '/bin/ls' is given with a path; only bare names are allowed",
    });
  });

  it('should reject shell syntax in the program position', () => {
    expect(leadingToken('$(whoami)').ok).toBe(false);
  });
});

describe('structuralWarnings', () => {
  it('should flag chained commands', () => {
    expect(structuralWarnings('mkdir src && touch src/app.py')).toEqual(['multiple commands chained on one line']);
  });

  it('should return nothing for a plain command', () => {
    expect(structuralWarnings('ls -la')).toEqual([]);
  });
});

describe('SecurityValidator', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should deny a program outside the whitelist without asking the analyzer', async () => {
    const analyzer = new FakeAnalyzer();

    const verdict = await validator(analyzer).validate('curl http://x', task);

    expect(verdict.decision).toBe('deny');
    expect(verdict.stage).toBe('whitelist');
    expect(verdict.whitelist_match).toBe(false);
    expect(verdict.rationale).toBe("not whitelisted: 'curl' is not in command_whitelist");
    expect(analyzer.calls).toEqual([]);
  });

  it('should deny at sanitize when nothing is left', async () => {
    const verdict = await validator(new FakeAnalyzer()).validate('\x00\x01  ', task);

    expect(verdict.stage).toBe('sanitize');
    expect(verdict.decision).toBe('deny');
  });

  it('should let the blacklist override the whitelist', async () => {
    const analyzer = new FakeAnalyzer();

    const verdict = await validator(analyzer, { command_whitelist: ['rm'] }).validate('rm -rf /', task);

    expect(verdict).toMatchObject({
      decision: 'deny',
      stage: 'blacklist',
      whitelist_match: true,
      blacklist_match: 'rm\\s+-[a-z]*[rf][a-z]*\\s+/',
      semantic: null,
    });
    expect(analyzer.calls).toEqual([]);
  });

  it('should match blacklist patterns case-insensitively', async () => {
    const verdict = await validator(new FakeAnalyzer()).validate('echo SUDO', task);

    expect(verdict.stage).toBe('blacklist');
    expect(verdict.blacklist_match).toBe('sudo');
  });

  it('should allow when every stage passes', async () => {
    const analyzer = new FakeAnalyzer({ decision: 'allow', rationale: 'installs a package' });

    const verdict = await validator(analyzer).validate('pip   install flask', task);

    expect(verdict).toEqual({
      command: 'pip   install flask',
      sanitized_command: 'pip install flask',
      whitelist_match: true,
      blacklist_match: null,
      semantic: 'allow',
      decision: 'allow',
      stage: 'semantic',
      rationale: 'installs a package',
      warnings: [],
      permissive_override: false,
    });
    expect(analyzer.calls).toEqual(['pip install flask']);
  });

  it('should deny when the analyzer denies', async () => {
    const verdict = await validator(new FakeAnalyzer({ decision: 'deny', rationale: 'exfiltration' })).validate(
      'cat secrets.txt',
      task
    );

    expect(verdict.decision).toBe('deny');
    expect(verdict.stage).toBe('semantic');
    expect(verdict.rationale).toBe('exfiltration');
  });

  it('should deny an uncertain command under strict', async () => {
    const verdict = await validator(new FakeAnalyzer({ decision: 'uncertain', rationale: 'unclear' })).validate(
      'python run.py',
      task
    );

    expect(verdict.decision).toBe('deny');
    expect(verdict.semantic).toBe('uncertain');
    expect(verdict.rationale).toBe('uncertain, denied under strict security_level: unclear');
  });

  it('should allow an uncertain command under permissive and flag it', async () => {
    const security = validator(new FakeAnalyzer({ decision: 'uncertain', rationale: 'unclear' }), {
      security_level: 'permissive',
    });

    const verdict = await security.validate('python run.py', task);

    expect(verdict.decision).toBe('allow');
    expect(verdict.permissive_override).toBe(true);
    expect(verdict.rationale).toBe('uncertain, allowed by permissive security_level: unclear');
    expect(security.stats().permissive_overrides).toBe(1);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('[SECURITY] PERMISSIVE OVERRIDE'));
  });

  it('should treat an analyzer error as uncertain', async () => {
    const verdict = await validator(new FakeAnalyzer(new Error('model offline'))).validate('ls', task);

    expect(verdict.decision).toBe('deny');
    expect(verdict.rationale).toBe(
      'uncertain, denied under strict security_level: security analyzer error: model offline'
    );
  });

  it('should propagate a fatal analyzer error under either level', async () => {
    const fatal = () => new FakeAnalyzer(new FatalModelError('bad credentials', 'security_analyzer'));

    await expect(validator(fatal()).validate('ls', task)).rejects.toBeInstanceOf(FatalModelError);
    await expect(validator(fatal(), { security_level: 'permissive' }).validate('ls', task)).rejects.toBeInstanceOf(
      FatalModelError
    );
  });

  it('should report the analyzer usage with the verdict', async () => {
    const security = validator(new FakeAnalyzer(undefined, { cost_usd: 0.125, tokens: 7 }));

    const allowed = await security.evaluate('ls', task);
    const denied = await security.evaluate('curl http://x', task);

    expect(allowed.verdict.decision).toBe('allow');
    expect(allowed.usage).toEqual({ cost_usd: 0.125, tokens: 7 });
    expect(denied.usage).toEqual({ cost_usd: 0, tokens: 0 });
  });

  it('should treat a missing analyzer as uncertain', async () => {
    const verdict = await validator(null).validate('ls', task);

    expect(verdict.decision).toBe('deny');
    expect(verdict.rationale).toBe('uncertain, denied under strict security_level: no security analyzer configured');
  });

  it('should count validations and denials by stage', async () => {
    const security = validator(new FakeAnalyzer());

    await security.validate('ls', task);
    await security.validate('curl http://x', task);
    await security.validate('echo sudo', task);

    expect(security.stats()).toEqual({
      validations: 3,
      denied: 2,
      denied_by_stage: { sanitize: 0, whitelist: 1, blacklist: 1, semantic: 0 },
      permissive_overrides: 0,
    });
  });

  it('should not count static checks', () => {
    const security = validator(null);

    const check = security.checkStatic('ls -la');

    expect(check).toEqual({ passed: true, sanitized: 'ls -la', warnings: [] });
    expect(security.stats().validations).toBe(0);
  });
});
