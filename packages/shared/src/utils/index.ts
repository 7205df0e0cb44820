export { generateUlid, generatePublicCode } from './ulid';
export { toDecimal, multiplyMoney, applyRate, basisPointsToRate } from './money';
