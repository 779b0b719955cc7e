export class MinerError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'MinerError';
  }
}

export class ConfigurationError extends MinerError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

export class AlreadyStartedError extends MinerError {
  constructor(state: string) {
    super('ALREADY_STARTED', `Miner already started (state: ${state})`);
    this.name = 'AlreadyStartedError';
  }
}

export class InvalidTransitionError extends MinerError {
  constructor(action: string, state: string) {
    super('INVALID_TRANSITION', `Cannot ${action} a miner in state ${state}`);
    this.name = 'InvalidTransitionError';
  }
}
