/**
 * Connection Errors
 *
 * Failures surfaced by `connect()`. Everything after the handshake is
 * reported through events or "no result" return values instead.
 */

export class PchkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The gateway has no free license slot for another client. */
export class PchkLicenseError extends PchkError {
  constructor(
    message = 'License Error: Maximum number of connections was reached. An additional license key is required.'
  ) {
    super(message);
  }
}

export class PchkAuthenticationError extends PchkError {
  constructor(message = 'Authentication failed') {
    super(message);
  }
}

/** The TCP connection could not be opened. */
export class PchkConnectionRefusedError extends PchkError {
  constructor(message = 'Connection refused') {
    super(message);
  }
}

/** The handshake did not complete in time. */
export class PchkConnectionFailedError extends PchkError {
  constructor(message = 'Connection failed') {
    super(message);
  }
}

/** Logged in, but the gateway never reported the bus as connected. */
export class PchkLcnNotConnectedError extends PchkError {
  constructor(message = 'LCN not connected.') {
    super(message);
  }
}
