/**
 * Exact rational number over bigint.
 *
 * Sample rates and every instant/duration in the reader are Rationals so that
 * `start + i / rate` never accumulates floating point error, however long the
 * recording.
 */
export class Rational {
  readonly num: bigint
  readonly den: bigint

  private constructor(num: bigint, den: bigint) {
    this.num = num
    this.den = den
  }

  static readonly ZERO = new Rational(0n, 1n)
  static readonly ONE = new Rational(1n, 1n)

  static of(num: bigint | number, den: bigint | number = 1n): Rational {
    const n = typeof num === 'bigint' ? num : toBigInt(num)
    const d = typeof den === 'bigint' ? den : toBigInt(den)
    if (d === 0n) {
      throw new RangeError('Rational: zero denominator')
    }
    const sign = d < 0n ? -1n : 1n
    const g = gcd(abs(n), abs(d))
    return new Rational((sign * n) / g, (sign * d) / g)
  }

  /**
   * Parse a decimal ("128", "-0.0625", "1.5e-3") or fraction ("1/3") string.
   * Returns null when the text is not a finite number.
   */
  static parse(text: string): Rational | null {
    const s = text.trim()
    const frac = s.match(/^([+-]?\d+)\s*\/\s*([+-]?\d+)$/)
    if (frac) {
      const den = BigInt(frac[2])
      return den === 0n ? null : Rational.of(BigInt(frac[1]), den)
    }

    const m = s.match(/^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/)
    if (!m) return null
    const intPart = m[2] ?? ''
    const fracPart = m[3] ?? ''
    if (intPart === '' && fracPart === '') return null

    const negative = m[1] === '-'
    let num = BigInt((intPart || '0') + fracPart)
    let den = 10n ** BigInt(fracPart.length)
    const exp = m[4] ? parseInt(m[4], 10) : 0
    if (exp > 0) num *= 10n ** BigInt(exp)
    if (exp < 0) den *= 10n ** BigInt(-exp)
    return Rational.of(negative ? -num : num, den)
  }

  /**
   * Convert a JS number through its shortest round-trip decimal form, so
   * `0.1` becomes exactly 1/10 and a float32 rate read from a header keeps the
   * decimal value the instrument wrote.
   */
  static fromNumber(value: number): Rational {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Rational: cannot represent ${value}`)
    }
    if (Number.isInteger(value)) return Rational.of(BigInt(value))
    const parsed = Rational.parse(String(value))
    if (!parsed) throw new RangeError(`Rational: cannot represent ${value}`)
    return parsed
  }

  /** Float32 values are widened through their shortest float32 decimal. */
  static fromFloat32(value: number): Rational {
    const f = Math.fround(value)
    for (let precision = 1; precision < 9; precision++) {
      const candidate = Number(f.toPrecision(precision))
      if (Math.fround(candidate) === f) return Rational.fromNumber(candidate)
    }
    return Rational.fromNumber(Number(f.toPrecision(9)))
  }

  add(other: Rational | bigint | number): Rational {
    const o = lift(other)
    return Rational.of(this.num * o.den + o.num * this.den, this.den * o.den)
  }

  sub(other: Rational | bigint | number): Rational {
    const o = lift(other)
    return Rational.of(this.num * o.den - o.num * this.den, this.den * o.den)
  }

  mul(other: Rational | bigint | number): Rational {
    const o = lift(other)
    return Rational.of(this.num * o.num, this.den * o.den)
  }

  div(other: Rational | bigint | number): Rational {
    const o = lift(other)
    if (o.num === 0n) {
      throw new RangeError('Rational: division by zero')
    }
    return Rational.of(this.num * o.den, this.den * o.num)
  }

  neg(): Rational {
    return new Rational(-this.num, this.den)
  }

  abs(): Rational {
    return this.num < 0n ? this.neg() : this
  }

  inverse(): Rational {
    return Rational.ONE.div(this)
  }

  compare(other: Rational | bigint | number): number {
    const o = lift(other)
    const lhs = this.num * o.den
    const rhs = o.num * this.den
    return lhs < rhs ? -1 : lhs > rhs ? 1 : 0
  }

  eq(other: Rational | bigint | number): boolean {
    return this.compare(other) === 0
  }

  lt(other: Rational | bigint | number): boolean {
    return this.compare(other) < 0
  }

  lte(other: Rational | bigint | number): boolean {
    return this.compare(other) <= 0
  }

  gt(other: Rational | bigint | number): boolean {
    return this.compare(other) > 0
  }

  gte(other: Rational | bigint | number): boolean {
    return this.compare(other) >= 0
  }

  isZero(): boolean {
    return this.num === 0n
  }

  isPositive(): boolean {
    return this.num > 0n
  }

  isInteger(): boolean {
    return this.den === 1n
  }

  floor(): bigint {
    const q = this.num / this.den
    return this.num < 0n && q * this.den !== this.num ? q - 1n : q
  }

  ceil(): bigint {
    const q = this.num / this.den
    return this.num > 0n && q * this.den !== this.num ? q + 1n : q
  }

  toNumber(): number {
    if (this.den === 1n) return Number(this.num)
    // Scale before dividing so large numerators keep their fractional digits
    const whole = this.num / this.den
    const rest = this.num - whole * this.den
    return Number(whole) + Number((rest * 10n ** 18n) / this.den) / 1e18
  }

  toString(): string {
    return this.den === 1n ? this.num.toString() : `${this.num}/${this.den}`
  }

  static min(a: Rational, b: Rational): Rational {
    return a.lte(b) ? a : b
  }

  static max(a: Rational, b: Rational): Rational {
    return a.gte(b) ? a : b
  }
}

function lift(value: Rational | bigint | number): Rational {
  if (value instanceof Rational) return value
  if (typeof value === 'bigint') return Rational.of(value)
  return Rational.fromNumber(value)
}

function toBigInt(value: number): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Rational: ${value} is not a safe integer`)
  }
  return BigInt(value)
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n
}

function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) {
    const t = a % b
    a = b
    b = t
  }
  return a === 0n ? 1n : a
}
