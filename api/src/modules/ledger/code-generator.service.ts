import { Injectable, Logger } from '@nestjs/common';
import { randomInt } from 'crypto';
import { AppConfigService } from '../../core/config/app-config.service';
import { conflictError, fail, ok, type Result } from './ledger.errors';
import { TOKEN_KINDS, type TokenKind } from './ledger.types';

/** Unambiguous characters only: no O, I, 0 or 1. */
export const CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const CODE_SUFFIX_LENGTH = 5;

const KIND_CODES: Record<TokenKind, string> = {
  signup: 'REG',
  social: 'SOC',
  review: 'REV',
  video: 'VID',
  special: 'SPC',
};

const CODE_PATTERN = new RegExp(
  `^[A-Z0-9]{3}(${Object.values(KIND_CODES).join('|')})[${CODE_ALPHABET}]{${CODE_SUFFIX_LENGTH}}$`,
);

/**
 * Persists a candidate code atomically (insert-if-absent). Resolves to null
 * when the code is already taken.
 */
export type TryInsert<T> = (code: string) => Promise<T | null>;

export type GeneratedCode<T> = { code: string; value: T };

@Injectable()
export class CodeGeneratorService {
  private readonly logger = new Logger(CodeGeneratorService.name);
  private readonly maxAttempts: number;

  constructor(config: AppConfigService) {
    this.maxAttempts = config.getCodeMaxAttempts();
  }

  prefixFor(tenantId: string, kind: TokenKind): string {
    const tenantPart = tenantId
      .replace(/[^a-z0-9]/gi, '')
      .slice(0, 3)
      .toUpperCase()
      .padEnd(3, 'X');
    return `${tenantPart}${KIND_CODES[kind]}`;
  }

  randomSuffix(): string {
    let out = '';
    for (let i = 0; i < CODE_SUFFIX_LENGTH; i++) {
      out += CODE_ALPHABET[randomInt(0, CODE_ALPHABET.length)];
    }
    return out;
  }

  /** Epoch millis in base 32 over the code alphabet, last five characters. */
  timestampSuffix(nowMs: number): string {
    const base = CODE_ALPHABET.length;
    let n = Math.max(0, Math.floor(nowMs));
    let encoded = '';
    while (n > 0) {
      encoded = CODE_ALPHABET[n % base] + encoded;
      n = Math.floor(n / base);
    }
    return encoded
      .slice(-CODE_SUFFIX_LENGTH)
      .padStart(CODE_SUFFIX_LENGTH, CODE_ALPHABET[0]);
  }

  async generate<T>(
    tenantId: string,
    kind: TokenKind,
    tryInsert: TryInsert<T>,
  ): Promise<Result<GeneratedCode<T>>> {
    const prefix = this.prefixFor(tenantId, kind);
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const code = `${prefix}${this.randomSuffix()}`;
      const value = await tryInsert(code);
      if (value !== null) return ok({ code, value });
      this.logger.debug(`code collision tenant=${tenantId} attempt=${attempt}`);
    }
    const fallback = `${prefix}${this.timestampSuffix(Date.now())}`;
    const value = await tryInsert(fallback);
    if (value !== null) {
      this.logger.warn(
        `random codes exhausted, used timestamp code tenant=${tenantId}`,
      );
      return ok({ code: fallback, value });
    }
    return fail(
      conflictError(
        'code_exhausted',
        `Could not allocate a unique code after ${this.maxAttempts + 1} attempts`,
      ),
    );
  }

  isWellFormed(code: string): boolean {
    return CODE_PATTERN.test(code);
  }

  kindFromCode(code: string): TokenKind | null {
    if (!this.isWellFormed(code)) return null;
    const kindCode = code.slice(3, 6);
    return TOKEN_KINDS.find((kind) => KIND_CODES[kind] === kindCode) ?? null;
  }
}
