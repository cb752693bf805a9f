export class BinscopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Raised before any tool runs when the binary cannot be located
export class BinaryNotFoundError extends BinscopeError {
  constructor(public readonly filename: string) {
    super(filename ? `Unable to find binary file ${filename}` : 'No binary filename defined');
  }
}

export class InvalidPatternError extends BinscopeError {
  constructor(public readonly role: 'selection' | 'exclusion', public readonly pattern: string, reason: string) {
    super(`Invalid symbol ${role} pattern '${pattern}': ${reason}`);
  }
}

/**
 * The debug-info dump contained an attribute whose value does not have the
 * expected shape. Usually means the readelf version is not supported.
 */
export class DebugInfoParseError extends BinscopeError {
  constructor(message: string, public readonly line: string) {
    super(`${message} '${line}'`);
  }
}

export class ToolExecutionError extends BinscopeError {
  constructor(public readonly command: string, public readonly reason: string) {
    super(`Tool '${command}' failed: ${reason}`);
  }
}

export class SettingsError extends BinscopeError {}
