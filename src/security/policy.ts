import type { Identity } from '../sessions/types.js';

export interface SolveInput {
  identity: Identity;
  url: string;
}

export interface ValidationResult<T> {
  valid: boolean;
  sanitized?: T;
  errors: string[];
}

const MAX_FIELD_BYTES = 2048;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

// PyPI-style requirement: name, optional extras, optional version specifier
const PACKAGE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*(\[[A-Za-z0-9._,-]+\])?((==|>=|<=|~=|!=|>|<)[A-Za-z0-9.*+!-]+)?$/;
const MAX_PACKAGES = 20;

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function field(input: unknown, key: string): unknown {
  if (typeof input !== 'object' || input === null) return undefined;
  return new Map<string, unknown>(Object.entries(input)).get(key);
}

export function validateSolveInput(input: unknown): ValidationResult<SolveInput> {
  const errors: string[] = [];
  const email = field(input, 'email');
  const secret = field(input, 'secret');
  const url = field(input, 'url');

  if (typeof email !== 'string' || !email.trim()) {
    errors.push('email is required');
  } else if (!EMAIL_PATTERN.test(email.trim()) || Buffer.byteLength(email, 'utf-8') > MAX_FIELD_BYTES) {
    errors.push('email is not a valid address');
  }

  if (typeof secret !== 'string' || !secret) {
    errors.push('secret is required');
  } else if (Buffer.byteLength(secret, 'utf-8') > MAX_FIELD_BYTES) {
    errors.push('secret exceeds 2KB limit');
  }

  if (typeof url !== 'string' || !url.trim()) {
    errors.push('url is required');
  } else if (!isHttpUrl(url.trim())) {
    errors.push('url must be an absolute http(s) URL');
  }

  if (errors.length > 0 || typeof email !== 'string' || typeof secret !== 'string' || typeof url !== 'string') {
    return { valid: false, errors };
  }

  return {
    valid: true,
    sanitized: { identity: { email: email.trim(), secret }, url: url.trim() },
    errors: [],
  };
}

/** Dependency requests are limited to plain package requirements; nothing reaches a shell. */
export function validateDependencyList(packages: readonly string[]): ValidationResult<string[]> {
  const errors: string[] = [];
  if (packages.length === 0) errors.push('at least one package is required');
  if (packages.length > MAX_PACKAGES) errors.push(`at most ${MAX_PACKAGES} packages per request`);

  const sanitized: string[] = [];
  for (const raw of packages) {
    const name = raw.trim();
    if (!PACKAGE_PATTERN.test(name)) {
      errors.push(`invalid package name: ${JSON.stringify(raw)}`);
      continue;
    }
    if (!sanitized.includes(name)) sanitized.push(name);
  }

  if (errors.length > 0) return { valid: false, errors };
  return { valid: true, sanitized, errors: [] };
}
