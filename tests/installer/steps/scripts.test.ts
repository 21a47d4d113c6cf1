import { describe, it, expect } from 'vitest';
import { renderLauncher } from '../../../installer/src/steps/scripts.js';
import { summarizeOutcomes } from '../../../installer/src/steps/complete.js';

describe('renderLauncher', () => {
  it('execs node with its flags and forwards arguments', () => {
    expect(renderLauncher('/usr/bin/node', ['--import', 'tsx'], '/opt/narnia/feedback.ts', 'Narnia prompt feedback')).toBe(
      '#!/bin/bash\n# Narnia prompt feedback\nexec /usr/bin/node --import tsx /opt/narnia/feedback.ts "$@"\n'
    );
  });

  it('quotes paths with spaces', () => {
    expect(renderLauncher('/usr/bin/node', [], "/opt/my app/it's.js", 'x')).toBe(
      `#!/bin/bash\n# x\nexec /usr/bin/node '/opt/my app/it'\\''s.js' "$@"\n`
    );
  });
});

describe('summarizeOutcomes', () => {
  it('counts configured and skipped steps', () => {
    expect(
      summarizeOutcomes([
        { id: 'a', status: 'done' },
        { id: 'b', status: 'skipped' },
        { id: 'c', status: 'skipped' },
      ])
    ).toBe('1 configured, 2 already in place');
  });
});
