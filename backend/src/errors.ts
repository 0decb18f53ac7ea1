/*
Error kinds raised by the table server.

Fatal ones (configuration, empty registration, a dropped peer) propagate to
the entry point, which prints the message and exits non-zero. A player typing
something invalid is never an error here: the engine re-prompts instead.
*/

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NoParticipantsError extends Error {
  constructor(message = 'Nobody connected!') {
    super(message);
    this.name = 'NoParticipantsError';
  }
}

export class NoNamesError extends Error {
  constructor(message = 'Nobody sent a name!') {
    super(message);
    this.name = 'NoNamesError';
  }
}

export class PeerDisconnectedError extends Error {
  constructor(readonly peer: string) {
    super(`${peer} disconnected`);
    this.name = 'PeerDisconnectedError';
  }
}

/** Deck and discard pile are both empty: some cards left the table. */
export class DeckExhaustedError extends Error {
  constructor() {
    super('No cards left to draw');
    this.name = 'DeckExhaustedError';
  }
}

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}
