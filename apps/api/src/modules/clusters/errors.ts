export class ClusterApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly path: string
  ) {
    super(message);
    this.name = 'ClusterApiError';
  }
}

export class PairingError extends Error {
  constructor(
    message: string,
    readonly mcUid: string,
    readonly clusterUid: string
  ) {
    super(message);
    this.name = 'PairingError';
  }
}
