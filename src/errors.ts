/** Invalid command-line configuration, detected before any scanning. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A project file that could not be read as MSBuild XML. */
export class ProjectFileError extends Error {
  constructor(
    readonly filePath: string,
    detail: string,
  ) {
    super(`Failed to parse ${filePath}: ${detail}`);
    this.name = "ProjectFileError";
  }
}
