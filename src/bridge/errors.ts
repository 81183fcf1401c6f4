/**
 * Error raised for bridge misuse and invalid bridge configuration.
 */
export class BridgeRuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BridgeRuntimeError';
  }
}
