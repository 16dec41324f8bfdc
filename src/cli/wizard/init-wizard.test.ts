// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@inquirer/prompts', () => ({
  input: vi.fn(),
  password: vi.fn(),
  confirm: vi.fn(),
}));

import { confirm, input, password } from '@inquirer/prompts';
import { ValidationError } from '../../errors/index.js';
import { normalizeTrackerUrl, runInitWizard, validateTrackerUrl } from './init-wizard.js';

describe('normalizeTrackerUrl', () => {
  it('should add the browse path to a bare host', () => {
    expect(normalizeTrackerUrl('https://tracker.example.com')).toBe(
      'https://tracker.example.com/browse/'
    );
    expect(normalizeTrackerUrl('https://tracker.example.com/')).toBe(
      'https://tracker.example.com/browse/'
    );
  });

  it('should keep an explicit path and add a trailing slash', () => {
    expect(normalizeTrackerUrl(' https://tracker.example.com/browse ')).toBe(
      'https://tracker.example.com/browse/'
    );
    expect(normalizeTrackerUrl('https://tracker.example.com/jira/browse/')).toBe(
      'https://tracker.example.com/jira/browse/'
    );
  });

  it('should keep an empty value empty', () => {
    expect(normalizeTrackerUrl('  ')).toBe('');
  });

  it('should reject values that are not http URLs', () => {
    expect(() => normalizeTrackerUrl('tracker.example.com')).toThrow(ValidationError);
    expect(() => normalizeTrackerUrl('ftp://tracker.example.com/')).toThrow(
      'Tracker URL must use http or https: ftp://tracker.example.com/'
    );
  });
});

describe('validateTrackerUrl', () => {
  it('should return true or the error message', () => {
    expect(validateTrackerUrl('https://tracker.example.com')).toBe(true);
    expect(validateTrackerUrl('nope')).toBe('Invalid tracker URL: nope');
  });
});

describe('runInitWizard', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  describe('non-interactive mode', () => {
    it('should return empty credentials when no flags are given', async () => {
      expect(await runInitWizard({ nonInteractive: true })).toEqual({
        tracker: { base_url: '', token: '' },
        review: { token: '' },
        installHook: false,
      });
      expect(input).not.toHaveBeenCalled();
    });

    it('should use the flags', async () => {
      const result = await runInitWizard({
        nonInteractive: true,
        trackerUrl: 'https://tracker.example.com',
        trackerToken: 'test-secret',
        reviewToken: 'review-secret',
        installHook: true,
      });

      expect(result).toEqual({
        tracker: { base_url: 'https://tracker.example.com/browse/', token: 'test-secret' },
        review: { token: 'review-secret' },
        installHook: true,
      });
    });
  });

  describe('interactive mode', () => {
    it('should prompt for every value', async () => {
      vi.mocked(input).mockResolvedValueOnce('https://tracker.example.com/browse/');
      vi.mocked(password).mockResolvedValueOnce('test-secret').mockResolvedValueOnce('');
      vi.mocked(confirm).mockResolvedValueOnce(true);

      const result = await runInitWizard();

      expect(result).toEqual({
        tracker: { base_url: 'https://tracker.example.com/browse/', token: 'test-secret' },
        review: { token: '' },
        installHook: true,
      });
      expect(password).toHaveBeenCalledTimes(2);
    });

    it('should not prompt for tokens given as flags', async () => {
      vi.mocked(input).mockResolvedValueOnce('');
      vi.mocked(confirm).mockResolvedValueOnce(false);

      const result = await runInitWizard({ trackerToken: 'test-secret', reviewToken: 'other' });

      expect(password).not.toHaveBeenCalled();
      expect(result.tracker.token).toBe('test-secret');
      expect(result.review.token).toBe('other');
      expect(result.installHook).toBe(false);
    });
  });
});
