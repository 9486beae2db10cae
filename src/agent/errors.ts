export class AgentError extends Error {
  constructor(readonly fn: string, message: string) {
    super(`${fn}: ${message}`);
    this.name = new.target.name;
  }
}

// RCON itself failed: not connected, timed out, socket error.
export class AgentTransportError extends AgentError {}

// The engine answered with something that is not a valid reply.
export class AgentProtocolError extends AgentError {
  constructor(fn: string, message: string, readonly raw: string) {
    super(fn, message);
  }
}

// The mod ran and reported { ok = false }.
export class AgentCallError extends AgentError {
  constructor(fn: string, readonly err: string, readonly index?: number) {
    super(fn, index === undefined ? err : `op ${index}: ${err}`);
  }
}
