/**
 * Gateway metrics tracking
 */

export class Metrics {
  private connectionCount: number = 0;
  private totalBytesSent: number = 0;
  private totalBytesReceived: number = 0;
  private loginsSucceeded: number = 0;
  private loginsFailed: number = 0;
  private ordersAccepted: number = 0;
  private ordersRejected: number = 0;
  private protocolErrors: number = 0;
  private startTime: number = Date.now();

  connectionOpened(): void {
    this.connectionCount++;
  }

  connectionClosed(): void {
    this.connectionCount = Math.max(0, this.connectionCount - 1);
  }

  bytesSent(bytes: number): void {
    this.totalBytesSent += bytes;
  }

  bytesReceived(bytes: number): void {
    this.totalBytesReceived += bytes;
  }

  login(success: boolean): void {
    if (success) {
      this.loginsSucceeded++;
    } else {
      this.loginsFailed++;
    }
  }

  order(accepted: boolean): void {
    if (accepted) {
      this.ordersAccepted++;
    } else {
      this.ordersRejected++;
    }
  }

  protocolError(): void {
    this.protocolErrors++;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot() {
    const uptimeMs = Date.now() - this.startTime;
    const uptimeSec = Math.floor(uptimeMs / 1000);
    const orders = this.ordersAccepted + this.ordersRejected;

    return {
      uptime: `${uptimeSec}s`,
      connections: this.connectionCount,
      totalBytesSent: this.formatBytes(this.totalBytesSent),
      totalBytesReceived: this.formatBytes(this.totalBytesReceived),
      loginsSucceeded: this.loginsSucceeded,
      loginsFailed: this.loginsFailed,
      ordersAccepted: this.ordersAccepted,
      ordersRejected: this.ordersRejected,
      protocolErrors: this.protocolErrors,
      ordersPerSecond:
        uptimeSec > 0 ? (orders / uptimeSec).toFixed(2) : "0.00",
    };
  }

  /**
   * Format bytes to human-readable
   */
  formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }

  /**
   * Print metrics to console
   */
  print(): void {
    const snapshot = this.getSnapshot();
    console.log("\nGateway Metrics:");
    console.log(`  Uptime:              ${snapshot.uptime}`);
    console.log(`  Active Connections:  ${snapshot.connections}`);
    console.log(`  Bytes Sent:          ${snapshot.totalBytesSent}`);
    console.log(`  Bytes Received:      ${snapshot.totalBytesReceived}`);
    console.log(`  Logins OK/Failed:    ${snapshot.loginsSucceeded}/${snapshot.loginsFailed}`);
    console.log(`  Orders Accepted:     ${snapshot.ordersAccepted}`);
    console.log(`  Orders Rejected:     ${snapshot.ordersRejected}`);
    console.log(`  Protocol Errors:     ${snapshot.protocolErrors}`);
    console.log(`  Orders/sec:          ${snapshot.ordersPerSecond}`);
    console.log();
  }
}

export const metrics = new Metrics();
