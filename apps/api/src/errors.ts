export class MalformedInputError extends Error {
  readonly artifact: string;

  constructor(artifact: string, message: string) {
    super(`${artifact}: ${message}`);
    this.name = 'MalformedInputError';
    this.artifact = artifact;
  }
}
