export class PathExistsError extends Error {
  readonly code = "EEXIST";

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Path already exists: ${path}`, options);
    this.name = "PathExistsError";
  }
}
