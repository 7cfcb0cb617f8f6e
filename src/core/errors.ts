export class LstreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FlagsFileNotFoundError extends LstreeError {
  readonly file: string;

  constructor(file: string) {
    super(`Flags file '${file}' not found. Ignoring.`);
    this.file = file;
  }
}
