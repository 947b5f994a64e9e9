// SPDX-License-Identifier: Apache-2.0

export interface IRequestDetails {
  requestId: string;
  ipAddress: string;
  connectionId?: string;
}

/**
 * Identifies a request (and the connection it arrived on) in logs and error messages.
 */
export class RequestDetails {
  requestId: string;
  ipAddress: string;
  connectionId?: string;

  constructor(details: IRequestDetails) {
    this.requestId = details.requestId;
    this.ipAddress = details.ipAddress;
    this.connectionId = details.connectionId;
  }

  get formattedRequestId(): string {
    return this.requestId ? `[Request ID: ${this.requestId}]` : '';
  }

  get formattedConnectionId(): string | undefined {
    return this.connectionId ? `[Connection ID: ${this.connectionId}]` : '';
  }

  get formattedLogPrefix(): string {
    const connectionId = this.formattedConnectionId;
    const requestId = this.formattedRequestId;
    if (connectionId && requestId) {
      return `${connectionId} ${requestId}`;
    }
    return connectionId || requestId;
  }
}
