import { SilentError } from "./errors.js";

export class VersionExit extends SilentError {
  constructor() {
    super("", { isUserError: false });
    this.name = "VersionExit";
  }
}

export class HelpExit extends SilentError {
  constructor() {
    super("", { isUserError: false });
    this.name = "HelpExit";
  }
}

/** The command reported its own failure and wants a non-zero exit. */
export class CommandFailed extends SilentError {
  constructor(message = "") {
    super(message, { exitCode: 1 });
    this.name = "CommandFailed";
  }
}
