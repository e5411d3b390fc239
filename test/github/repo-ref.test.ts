import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { MalformedRepoRefError } from '../../src/core/errors.js';
import { formatRepoRef, parseRepoRef } from '../../src/github/repo-ref.js';

describe('parseRepoRef', () => {
  it('splits a GitHub URL', () => {
    expect(parseRepoRef('https://github.com/acme/widgets')).toEqual({ owner: 'acme', repo: 'widgets' });
  });

  it('accepts a bare path with a .git suffix', () => {
    expect(parseRepoRef('acme/widgets.git')).toEqual({ owner: 'acme', repo: 'widgets' });
  });

  it('ignores surrounding whitespace and a trailing slash', () => {
    expect(parseRepoRef('  https://github.com/acme/widgets/ ')).toEqual({ owner: 'acme', repo: 'widgets' });
  });

  it.each(['', 'https://github.com/', 'https://github.com/acme', 'acme', 'acme/.git'])(
    'rejects %j',
    (url) => {
      expect(() => parseRepoRef(url)).toThrow(MalformedRepoRefError);
    }
  );

  it('keeps the offending URL in the error', () => {
    expect(() => parseRepoRef('acme')).toThrow("Invalid repository URL: 'acme'");
  });

  it('recovers owner and repo from any formatted URL', () => {
    const segment = fc.stringMatching(/^[A-Za-z0-9_-]{1,20}$/);
    fc.assert(
      fc.property(segment, segment, (owner, repo) => {
        const ref = parseRepoRef(`https://github.com/${owner}/${repo}`);
        expect(ref).toEqual({ owner, repo });
        expect(formatRepoRef(ref)).toBe(`${owner}/${repo}`);
      })
    );
  });
});
