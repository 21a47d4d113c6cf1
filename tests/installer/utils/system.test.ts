import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { commandExists, createShellProbe, isWSL, shellQuote, type ShellProbe } from '../../../installer/src/utils/system.js';

describe('shellQuote', () => {
  it('leaves safe words alone', () => {
    expect(shellQuote('/home/tester/.nvm')).toBe('/home/tester/.nvm');
    expect(shellQuote('python=3.10')).toBe('python=3.10');
    expect(shellQuote('@google/gemini-cli')).toBe('@google/gemini-cli');
  });

  it('single-quotes everything else', () => {
    expect(shellQuote('a b')).toBe("'a b'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote('$HOME')).toBe("'$HOME'");
  });
});

describe('isWSL', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wsl-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('detects a Microsoft kernel banner', () => {
    const banner = join(dir, 'version');
    writeFileSync(banner, 'Linux version 5.15.90.1-microsoft-standard-WSL2 (gcc version 11.2.0)\n');

    expect(isWSL(banner)).toBe(true);
  });

  it('is false for other kernels and missing files', () => {
    const banner = join(dir, 'version');
    writeFileSync(banner, 'Linux version 6.1.0-18-amd64 (debian-kernel@lists.debian.org)\n');

    expect(isWSL(banner)).toBe(false);
    expect(isWSL(join(dir, 'missing'))).toBe(false);
  });
});

describe('createShellProbe', () => {
  it('captures stdout and the exit code', async () => {
    const probe = createShellProbe({ PATH: process.env.PATH });

    expect(await probe.capture('echo one; echo two')).toEqual({ exitCode: 0, stdout: 'one\ntwo\n' });
    expect(await probe.capture('echo partial; exit 3')).toEqual({ exitCode: 3, stdout: 'partial\n' });
  });
});

describe('commandExists', () => {
  it('asks command -v for the quoted name', async () => {
    const commands: string[] = [];
    const probe: ShellProbe = {
      async capture(command) {
        commands.push(command);
        return { exitCode: 0, stdout: '/usr/local/bin/gemini\n' };
      },
    };

    expect(await commandExists(probe, 'gemini')).toBe(true);
    expect(commands).toEqual(['command -v gemini']);
  });

  it('is false on a non-zero exit', async () => {
    const probe: ShellProbe = { capture: async () => ({ exitCode: 1, stdout: '' }) };

    expect(await commandExists(probe, 'gemini')).toBe(false);
  });
});
