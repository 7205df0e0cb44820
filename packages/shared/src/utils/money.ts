// All amounts are integer cents unless a name says otherwise.

function toDecimal(cents: number): number {
  return cents / 100;
}

function multiplyMoney(cents: number, qty: number): number {
  return Math.round(cents * qty);
}

/** Rate is a decimal fraction (0.1 = 10%). Half-up rounding to the cent. */
function applyRate(cents: number, rate: number): number {
  if (cents === 0 || rate === 0) return 0;
  return Math.round(cents * rate);
}

function basisPointsToRate(bps: number): number {
  return bps / 10_000;
}

export { toDecimal, multiplyMoney, applyRate, basisPointsToRate };
