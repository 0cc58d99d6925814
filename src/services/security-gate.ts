/**
 * Security/validation gate for user-supplied trip fields
 *
 * Every field passes, in order: length cap, sanitisation, dangerous-pattern
 * scan, URL allow-list and per-field format checks. Values that reach the
 * audit log are masked first.
 */

import { SecurityViolation, ValidationError } from '../utils/errors.js';
import type { ParcelDimensions, TripDetailField, TripDetails } from '../types/booking.js';

export interface SecurityGateConfig {
  maxFieldLength: number;
  allowedUrlDomains: string[];
}

export type GateResult =
  | { ok: true; patch: Partial<TripDetails> }
  | { ok: false; error: ValidationError | SecurityViolation };

interface DangerousPattern {
  name: string;
  pattern: RegExp;
}

const DANGEROUS_PATTERNS: DangerousPattern[] = [
  { name: 'shell_rm', pattern: /rm\s+-rf/i },
  { name: 'shell_sudo', pattern: /sudo\s+/i },
  { name: 'pipe_to_shell', pattern: /(curl|wget).*\|.*sh/i },
  { name: 'code_eval', pattern: /eval\s*\(/i },
  { name: 'code_exec', pattern: /exec\s*\(/i },
  { name: 'dynamic_import', pattern: /__import__/i },
  { name: 'subprocess', pattern: /subprocess/i },
  { name: 'os_system', pattern: /os\.system/i },
  { name: 'shell_flag', pattern: /shell\s*=\s*true/i },
  { name: 'script_tag', pattern: /<\s*script/i },
  { name: 'javascript_uri', pattern: /javascript:/i },
  { name: 'sql_drop', pattern: /;\s*drop\s+table/i },
  { name: 'sql_tautology', pattern: /'\s*or\s*'?1'?\s*=\s*'?1/i },
  { name: 'sql_union', pattern: /union\s+(all\s+)?select/i },
  { name: 'template_injection', pattern: /\$\{/ },
];

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/gi;
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_PATTERN = /(?:\+\d{1,3}[\s-]?)?\b\d{3}[\s-]?\d{3}[\s-]?\d{4}\b/g;
const TOKEN_PATTERN = /\b[A-Za-z0-9]{20,}\b/g;

const WEIGHT_PATTERN = /^(-?\d+(?:\.\d+)?)\s*(kg|kgs|kilograms?|t|tons?|tonnes?)?$/i;
const DIMENSIONS_PATTERN =
  /^(-?\d+(?:\.\d+)?)\s*[x×*]\s*(-?\d+(?:\.\d+)?)\s*[x×*]\s*(-?\d+(?:\.\d+)?)\s*(cm|mm|m)?$/i;
const MONEY_PATTERN = /^(?:₹|rs\.?|inr|\$|usd)?\s*(-?\d[\d,]*(?:\.\d+)?)$/i;

type TextField = 'consigner' | 'consignee' | 'pickupAddress' | 'deliveryAddress' | 'specialInstructions';

const TEXT_FIELDS: readonly TextField[] = [
  'consigner',
  'consignee',
  'pickupAddress',
  'deliveryAddress',
  'specialInstructions',
];

const KNOWN_FIELDS: readonly TripDetailField[] = [
  ...TEXT_FIELDS,
  'parcelDimensions',
  'weightKg',
  'declaredValue',
];

export function isTripDetailField(field: string): field is TripDetailField {
  return KNOWN_FIELDS.some((known) => known === field);
}

const UNIT_TO_CM: Record<string, number> = { mm: 0.1, cm: 1, m: 100 };

export class SecurityGate {
  constructor(private readonly config: SecurityGateConfig) {}

  /**
   * Strip control characters and surrounding whitespace
   */
  sanitize(raw: string): string {
    return raw.replace(CONTROL_CHARS, '').trim();
  }

  /**
   * Scan free text for dangerous sequences and non-allow-listed URLs
   */
  inspect(field: string, text: string): SecurityViolation | null {
    for (const { name, pattern } of DANGEROUS_PATTERNS) {
      if (pattern.test(text)) {
        return new SecurityViolation(`Field '${field}' contains a disallowed sequence`, field, name);
      }
    }

    for (const url of text.match(URL_PATTERN) ?? []) {
      if (!this.isAllowedUrl(url)) {
        return new SecurityViolation(`Field '${field}' contains a disallowed link`, field, 'suspicious_url');
      }
    }

    return null;
  }

  /**
   * Validate one submitted field and convert it to its TripDetails shape
   */
  validateField(field: string, raw: unknown): GateResult {
    if (!isTripDetailField(field)) {
      return this.invalid(field, `Unknown field '${field}'`);
    }

    if (typeof raw === 'number') {
      return this.validateNumeric(field, raw);
    }

    if (field === 'parcelDimensions' && isDimensionsObject(raw)) {
      return this.checkDimensions([raw.lengthCm, raw.widthCm, raw.heightCm], 1);
    }

    if (typeof raw !== 'string') {
      return this.invalid(field, `Field '${field}' must be text`);
    }

    if (raw.length > this.config.maxFieldLength) {
      return this.invalid(field, `Field '${field}' exceeds ${this.config.maxFieldLength} characters`);
    }

    const value = this.sanitize(raw);
    const violation = this.inspect(field, value);
    if (violation) {
      return { ok: false, error: violation };
    }

    if (value.length === 0) {
      return this.invalid(field, `Field '${field}' must not be empty`);
    }

    switch (field) {
      case 'weightKg':
        return this.parseWeight(value);
      case 'parcelDimensions':
        return this.parseDimensions(value);
      case 'declaredValue':
        return this.parseMoney(value);
      default:
        return { ok: true, patch: textPatch(field, value) };
    }
  }

  /**
   * Mask personally identifying substrings (e-mail, phone, long tokens)
   */
  mask(text: string): string {
    return text
      .replace(EMAIL_PATTERN, (match) => `${match.slice(0, 3)}***@***.***`)
      .replace(PHONE_PATTERN, '***-***-****')
      .replace(
        TOKEN_PATTERN,
        (match) => `${match.slice(0, 4)}${'*'.repeat(match.length - 8)}${match.slice(-4)}`
      );
  }

  maskPayload(payload: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      result[key] = this.maskValue(value);
    }
    return result;
  }

  private maskValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.mask(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.maskValue(item));
    }
    if (typeof value === 'object' && value !== null) {
      const nested: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        nested[key] = this.maskValue(item);
      }
      return nested;
    }
    return value;
  }

  private isAllowedUrl(url: string): boolean {
    const host = /^https?:\/\/([^/:?#]+)/i.exec(url)?.[1]?.toLowerCase();
    if (!host) {
      return false;
    }
    return this.config.allowedUrlDomains.some(
      (domain) => host === domain.toLowerCase() || host.endsWith(`.${domain.toLowerCase()}`)
    );
  }

  private validateNumeric(field: TripDetailField, value: number): GateResult {
    switch (field) {
      case 'weightKg':
        return this.checkWeight(value, 1);
      case 'declaredValue':
        return this.checkMoney(value);
      default:
        return this.invalid(field, `Field '${field}' must be text`);
    }
  }

  private parseWeight(value: string): GateResult {
    const match = WEIGHT_PATTERN.exec(value);
    if (!match) {
      return this.invalid('weightKg', `Weight '${value}' is not a recognised weight (e.g. 250kg, 1.5t)`);
    }
    const unit = (match[2] ?? 'kg').toLowerCase();
    const factor = unit.startsWith('t') ? 1000 : 1;
    return this.checkWeight(Number(match[1]), factor);
  }

  private checkWeight(amount: number, factor: number): GateResult {
    if (!Number.isFinite(amount) || amount <= 0) {
      return this.invalid('weightKg', 'Weight must be a positive amount');
    }
    return { ok: true, patch: { weightKg: amount * factor } };
  }

  private parseDimensions(value: string): GateResult {
    const match = DIMENSIONS_PATTERN.exec(value);
    if (!match) {
      return this.invalid(
        'parcelDimensions',
        `Dimensions '${value}' must look like LxWxH (e.g. 120x80x60 cm)`
      );
    }
    const factor = UNIT_TO_CM[(match[4] ?? 'cm').toLowerCase()] ?? 1;
    return this.checkDimensions([Number(match[1]), Number(match[2]), Number(match[3])], factor);
  }

  private checkDimensions(values: number[], factor: number): GateResult {
    if (values.some((v) => !Number.isFinite(v) || v <= 0)) {
      return this.invalid('parcelDimensions', 'Each parcel dimension must be a positive length');
    }
    const [lengthCm, widthCm, heightCm] = values.map((v) => round(v * factor));
    const parcelDimensions: ParcelDimensions = { lengthCm, widthCm, heightCm };
    return { ok: true, patch: { parcelDimensions } };
  }

  private parseMoney(value: string): GateResult {
    const match = MONEY_PATTERN.exec(value);
    if (!match) {
      return this.invalid('declaredValue', `Declared value '${value}' is not an amount`);
    }
    return this.checkMoney(Number(match[1].replace(/,/g, '')));
  }

  private checkMoney(amount: number): GateResult {
    if (!Number.isFinite(amount) || amount <= 0) {
      return this.invalid('declaredValue', 'Declared value must be a positive amount');
    }
    return { ok: true, patch: { declaredValue: amount } };
  }

  private invalid(field: string, message: string): GateResult {
    return { ok: false, error: new ValidationError(message, [{ field, message }]) };
  }
}

function isDimensionsObject(raw: unknown): raw is ParcelDimensions {
  return (
    typeof raw === 'object' &&
    raw !== null &&
    'lengthCm' in raw &&
    'widthCm' in raw &&
    'heightCm' in raw &&
    typeof raw.lengthCm === 'number' &&
    typeof raw.widthCm === 'number' &&
    typeof raw.heightCm === 'number'
  );
}

function textPatch(field: TextField, value: string): Partial<TripDetails> {
  const patch: Partial<TripDetails> = {};
  patch[field] = value;
  return patch;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
