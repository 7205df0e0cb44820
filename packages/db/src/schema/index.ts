export * from './core';
export * from './menu';
export * from './carts';
export * from './orders';
