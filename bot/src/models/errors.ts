export class SessionAlreadyActiveError extends Error {
  constructor(readonly guildId: string) {
    super(`Guild ${guildId} already has an active capture session`);
    this.name = 'SessionAlreadyActiveError';
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class SettingsValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsValidationError';
  }
}
