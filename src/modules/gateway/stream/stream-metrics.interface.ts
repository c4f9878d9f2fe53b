/**
 * Metrics collected while a translated stream is served
 */
export interface StreamMetrics {
  /** Request ID */
  requestId: string;

  /** Time to first backend byte in milliseconds (null if no data received) */
  ttfbMs: number | null;

  /** Total latency in milliseconds */
  totalLatencyMs: number;

  /** Number of backend chunks decoded */
  chunkCount: number;

  /** Number of client events written */
  eventCount: number;

  /** Stream completion status */
  status: StreamStatus;

  /** Error message if the stream did not complete */
  errorMessage?: string;
}

/**
 * Stream completion status
 */
export type StreamStatus =
  | 'STREAMING'      // Still in flight
  | 'COMPLETED'      // Terminal events written
  | 'CLIENT_ABORT'   // Client disconnected
  | 'UPSTREAM_ERROR' // Backend stream failed mid-flight
  | 'TIMEOUT';       // Stream duration exceeded limit

/**
 * Options for the stream transform
 */
export interface StreamWrapperOptions {
  /** Maximum stream duration in milliseconds */
  maxDurationMs: number;

  /** Callback when the stream has ended, however it ended */
  onMetrics?: (metrics: StreamMetrics) => void;
}
