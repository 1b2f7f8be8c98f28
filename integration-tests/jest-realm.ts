// Jest runs each test file in its own vm context, so errors thrown by Node's
// built-in modules (fs, etc.) come from the host realm and fail
// `instanceof Error` inside the sandbox. Restore plain-Node semantics.
import { types } from 'node:util';

const ownHasInstance = Function.prototype[Symbol.hasInstance];

Object.defineProperty(Error, Symbol.hasInstance, {
  configurable: true,
  value(this: unknown, value: unknown): boolean {
    return ownHasInstance.call(this, value) || (this === Error && types.isNativeError(value));
  },
});
