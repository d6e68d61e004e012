/**
 * Tests for the CORS origin check
 */

import { describe, it, expect } from 'vitest';
import { isOriginAllowed } from '../api/middleware/cors.middleware.js';

const ALLOWED = ['http://localhost:8080', 'https://example.org'];

describe('isOriginAllowed', () => {
  it('should allow a listed origin', () => {
    expect(isOriginAllowed('https://example.org', ALLOWED)).toBe(true);
  });

  it('should allow subdomains of a listed https origin', () => {
    expect(isOriginAllowed('https://app.example.org', ALLOWED)).toBe(true);
  });

  it('should not allow a look-alike domain or plain http', () => {
    expect(isOriginAllowed('https://badexample.org', ALLOWED)).toBe(false);
    expect(isOriginAllowed('http://app.example.org', ALLOWED)).toBe(false);
  });

  it('should allow localhost on any port while localhost is listed', () => {
    expect(isOriginAllowed('http://localhost:5173', ALLOWED)).toBe(true);
    expect(isOriginAllowed('http://127.0.0.1:3000', ALLOWED)).toBe(true);
    expect(isOriginAllowed('http://localhost:5173', ['https://example.org'])).toBe(false);
  });

  it('should not treat a localhost prefix as localhost', () => {
    expect(isOriginAllowed('http://localhost.evil.test', ALLOWED)).toBe(false);
  });
});
