/**
 * Base Check Validator
 *
 * Shared construction helpers for the auditor's check validators.
 */

import type { AuditCheck, CheckStatus, CheckType } from '../types.js';
import { logger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';

export type CheckDetails = Pick<AuditCheck, 'hint' | 'expected' | 'actual'>;

/**
 * Abstract base class for validators producing one kind of audit check
 */
export abstract class BaseCheckValidator {
  /** Check type this validator emits */
  abstract readonly checkType: CheckType;

  private scopedLogger?: Logger;

  protected get log(): Logger {
    this.scopedLogger ??= logger.child(`AUDIT:${this.checkType}`);
    return this.scopedLogger;
  }

  /**
   * Create a check of this validator's type
   */
  protected createCheck(
    status: CheckStatus,
    field: string,
    message: string,
    details: CheckDetails = {}
  ): AuditCheck {
    const check: AuditCheck = { type: this.checkType, field, status, message };
    if (details.hint !== undefined) check.hint = details.hint;
    if (details.expected !== undefined) check.expected = details.expected;
    if (details.actual !== undefined) check.actual = details.actual;

    if (status === 'failed' || status === 'warning') {
      this.log.debug(`${field}: ${status} - ${message}`);
    }
    return check;
  }

  protected passed(field: string, message: string, details?: CheckDetails): AuditCheck {
    return this.createCheck('passed', field, message, details);
  }

  protected failed(field: string, message: string, details?: CheckDetails): AuditCheck {
    return this.createCheck('failed', field, message, details);
  }

  protected warning(field: string, message: string, details?: CheckDetails): AuditCheck {
    return this.createCheck('warning', field, message, details);
  }

  protected incomplete(field: string, message: string, details?: CheckDetails): AuditCheck {
    return this.createCheck('incomplete', field, message, details);
  }

  /**
   * Trimmed text of a field, or null when it is empty or undefined
   */
  protected textOf(value: string | null | undefined): string | null {
    if (value === undefined || value === null) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
}
