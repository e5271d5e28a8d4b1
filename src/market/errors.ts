export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null = null,
    readonly stderr = ''
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}
