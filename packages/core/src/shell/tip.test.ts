import { describe, it, expect } from 'vitest';
import { integrationTip } from './tip';

describe('integrationTip', () => {
  it('suggests the zsh integration', () => {
    expect(integrationTip({ SHELL: '/bin/zsh' })).toBe(
      'TIP: Enable shell integration to get commands straight into your prompt.\n' +
        '   Run: termwise init zsh >> ~/.zshrc && source ~/.zshrc\n' +
        '   To hide this tip: export TERMWISE_SUPPRESS_INTEGRATION_TIP=1',
    );
  });

  it('uses the fish config file and syntax', () => {
    const tip = integrationTip({ SHELL: '/usr/local/bin/fish' });
    expect(tip).toContain(
      'Run: termwise init fish >> ~/.config/fish/config.fish && source ~/.config/fish/config.fish',
    );
    expect(tip).toContain('set -Ux TERMWISE_SUPPRESS_INTEGRATION_TIP 1');
  });

  it('stays quiet when integration is active or suppressed', () => {
    expect(integrationTip({ SHELL: '/bin/bash', TERMWISE_SHELL_INTEGRATION: '1' })).toBeUndefined();
    expect(
      integrationTip({ SHELL: '/bin/bash', TERMWISE_SUPPRESS_INTEGRATION_TIP: '1' }),
    ).toBeUndefined();
  });

  it('stays quiet without a supported shell', () => {
    expect(integrationTip({})).toBeUndefined();
    expect(integrationTip({ SHELL: '/bin/tcsh' })).toBeUndefined();
  });
});
