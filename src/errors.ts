export class DocbridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The tool could not be started at all (missing binary, not executable).
 */
export class LaunchError extends DocbridgeError {
  constructor(
    public readonly tool: string,
    public readonly command: string,
    public readonly reason: Error
  ) {
    super(`Failed to launch ${tool} ('${command}'): ${reason.message}`);
  }
}

/**
 * The tool ran but did not exit cleanly.
 */
export class ExitError extends DocbridgeError {
  constructor(
    public readonly tool: string,
    public readonly status: number | null,
    public readonly signal: string | null
  ) {
    super(
      signal !== null
        ? `${tool} was terminated by ${signal}`
        : `${tool} exited with status ${status}`
    );
  }
}

export class ExtractorLaunchError extends LaunchError {
  constructor(command: string, cause: Error) {
    super('doxygen', command, cause);
  }
}

export class ExtractorExitError extends ExitError {
  constructor(status: number | null, signal: string | null) {
    super('doxygen', status, signal);
  }
}

/**
 * Doxygen exited with status 0 but left no XML index behind.
 */
export class ExtractorOutputError extends DocbridgeError {
  constructor(public readonly expectedFile: string) {
    super(`doxygen finished but produced no XML index at ${expectedFile}`);
  }
}

export class RendererLaunchError extends LaunchError {
  constructor(command: string, cause: Error) {
    super('sphinx-build', command, cause);
  }
}

export class RendererExitError extends ExitError {
  constructor(status: number | null, signal: string | null) {
    super('sphinx-build', status, signal);
  }
}
