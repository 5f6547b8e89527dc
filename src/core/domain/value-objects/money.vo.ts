const CURRENCY_PATTERN = /^[A-Z]{3}$/;

/**
 * Money value object in major units (e.g. 150.00 TRY), the unit the canonical
 * payment contract uses. Providers that bill in minor units convert at the edge.
 */
export class Money {
  private readonly _amount: number;
  private readonly _currency: string;

  constructor(amount: number, currency: string) {
    if (!Number.isFinite(amount)) {
      throw new Error('Amount must be a finite number');
    }
    if (amount < 0) {
      throw new Error('Amount cannot be negative');
    }
    const normalizedCurrency = (currency ?? '').toUpperCase();
    if (!CURRENCY_PATTERN.test(normalizedCurrency)) {
      throw new Error('Currency must be a 3-letter ISO 4217 code');
    }

    this._amount = amount;
    this._currency = normalizedCurrency;
  }

  get amount(): number {
    return this._amount;
  }

  get currency(): string {
    return this._currency;
  }

  static isValidCurrency(currency: string | undefined): boolean {
    return !!currency && CURRENCY_PATTERN.test(currency.toUpperCase());
  }

  equals(other: Money): boolean {
    return this._amount === other._amount && this._currency === other._currency;
  }

  isZero(): boolean {
    return this._amount === 0;
  }

  /**
   * Percentage of this amount, rounded to two decimals
   */
  percentage(rate: number): Money {
    return new Money(roundCurrency((this._amount * rate) / 100), this._currency);
  }

  /**
   * Convert to minor units (e.g. kobo from naira)
   */
  toMinorUnits(decimalPlaces = 2): number {
    return Math.round(this._amount * Math.pow(10, decimalPlaces));
  }

  static fromMinorUnits(amount: number, currency: string, decimalPlaces = 2): Money {
    return new Money(amount / Math.pow(10, decimalPlaces), currency);
  }

  /**
   * Two-decimal string the way most processor APIs expect prices
   */
  toFixed(): string {
    return this._amount.toFixed(2);
  }

  toString(): string {
    return `${this._currency} ${this.toFixed()}`;
  }

  toJSON() {
    return {
      amount: this._amount,
      currency: this._currency,
    };
  }
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
