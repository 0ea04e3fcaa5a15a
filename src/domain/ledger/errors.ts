export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed input (amount, account metadata, unknown kind). Raised before the
 * log is touched.
 */
export class ValidationError extends DomainError {
  constructor(message = 'Validation failed') {
    super(message);
  }
}

export class CreditLimitExceededError extends DomainError {
  constructor(
    public readonly accountId: string,
    public readonly creditLimitCents: number,
    public readonly attemptedBalanceCents: number
  ) {
    super(
      `Account ${accountId} would reach ${attemptedBalanceCents} cents, above its limit of ${creditLimitCents} cents`
    );
  }
}

/**
 * The balance chain would break: the appended event does not start where the
 * account's tail ends. The append is refused and the log stays unchanged.
 */
export class ConsistencyError extends DomainError {
  constructor(
    public readonly accountId: string,
    public readonly expectedBalanceBeforeCents: number,
    public readonly actualBalanceBeforeCents: number
  ) {
    super(
      `Balance chain mismatch on ${accountId}: tail ends at ${expectedBalanceBeforeCents} cents, event starts at ${actualBalanceBeforeCents} cents`
    );
  }
}

/**
 * A derived view disagrees with a full replay of the log. Never recovered.
 */
export class ProjectionIntegrityError extends DomainError {
  constructor(message: string) {
    super(message);
  }
}
