/**
 * Tests for hostname helpers
 */

import { describe, it, expect } from 'vitest';
import {
  cleanDomain,
  extractRootDomain,
  isSubdomainOf,
  isValidDomain,
} from '../src/utils/domain.js';

describe('cleanDomain', () => {
  it('should strip scheme, www, path and trailing dot', () => {
    expect(cleanDomain('https://www.Example.com/login')).toBe('example.com');
    expect(cleanDomain('http://api.example.com')).toBe('api.example.com');
    expect(cleanDomain('  Example.COM. ')).toBe('example.com');
  });
});

describe('isValidDomain', () => {
  it('should accept hostnames and reject the rest', () => {
    expect(isValidDomain('example.com')).toBe(true);
    expect(isValidDomain('a-b.c.example.co')).toBe(true);
    expect(isValidDomain('localhost')).toBe(false);
    expect(isValidDomain('-bad.example.com')).toBe(false);
    expect(isValidDomain('exa mple.com')).toBe(false);
  });
});

describe('extractRootDomain', () => {
  it('should keep the last two labels', () => {
    expect(extractRootDomain('a.b.example.com')).toBe('example.com');
    expect(extractRootDomain('example.com')).toBe('example.com');
    expect(extractRootDomain('localhost')).toBe('localhost');
  });
});

describe('isSubdomainOf', () => {
  it('should match strict subdomains only', () => {
    expect(isSubdomainOf('api.example.com', 'example.com')).toBe(true);
    expect(isSubdomainOf('api.example.com.', 'example.com')).toBe(true);
    expect(isSubdomainOf('example.com', 'example.com')).toBe(false);
    expect(isSubdomainOf('badexample.com', 'example.com')).toBe(false);
  });
});
