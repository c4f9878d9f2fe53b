import { Transform, TransformCallback, Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { Logger } from '@nestjs/common';
import { StreamError } from '../../../common/errors/proxy-errors';
import { StreamEvent } from '../../translate/interfaces/messages.interfaces';
import { SseDecoder, encodeEvent } from '../../translate/sse';
import { StreamTranslator } from '../../translate/stream.translator';
import {
  StreamMetrics,
  StreamStatus,
  StreamWrapperOptions,
} from './stream-metrics.interface';

/**
 * Turns the backend's chat-completion SSE bytes into Messages protocol SSE.
 * Backend failures, including the duration ceiling, end the client stream with
 * an `error` event instead of a broken connection.
 */
export class MessagesStream extends Transform {
  private readonly logger = new Logger(MessagesStream.name);

  private readonly requestId: string;
  private readonly startTime: number;
  private readonly maxDurationMs: number;
  private readonly onMetrics?: (metrics: StreamMetrics) => void;

  private readonly text = new StringDecoder('utf8');
  private readonly sse = new SseDecoder();
  private source?: Readable;

  // Metrics state
  private ttfbMs: number | null = null;
  private chunkCount = 0;
  private eventCount = 0;
  private status: StreamStatus = 'STREAMING';
  private errorMessage?: string;

  private timeoutHandle?: NodeJS.Timeout;
  private metricsEmitted = false;

  constructor(
    requestId: string,
    private readonly translator: StreamTranslator,
    options: StreamWrapperOptions,
  ) {
    super();
    this.requestId = requestId;
    this.startTime = Date.now();
    this.maxDurationMs = options.maxDurationMs;
    this.onMetrics = options.onMetrics;

    this.timeoutHandle = setTimeout(() => {
      this.fail('TIMEOUT', new StreamError(`Stream exceeded max duration of ${this.maxDurationMs}ms`));
    }, this.maxDurationMs);
  }

  /**
   * Read from `upstream` until it ends; upstream errors become an `error`
   * event.
   */
  attach(upstream: Readable): this {
    this.source = upstream;
    upstream.on('error', (error) => {
      this.fail('UPSTREAM_ERROR', new StreamError(`Upstream stream failed: ${error.message}`, error));
    });
    upstream.pipe(this);
    return this;
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (this.ttfbMs === null) {
      this.ttfbMs = Date.now() - this.startTime;
      this.logger.debug(`TTFB: ${this.ttfbMs}ms for request ${this.requestId}`);
    }
    this.consume(this.sse.push(this.text.write(chunk)));
    callback();
    if (this.sse.done) {
      this.releaseSource();
    }
  }

  _flush(callback: TransformCallback): void {
    this.clearTimeout();
    this.consume(this.sse.push(this.text.end()));
    this.consume(this.sse.flush());
    this.emitEvents(this.translator.finish());
    if (this.status === 'STREAMING') {
      this.status = 'COMPLETED';
    }
    this.emitMetrics();
    callback();
  }

  _destroy(error: Error | null, callback: (error: Error | null) => void): void {
    this.clearTimeout();
    this.source?.destroy();
    if (error) {
      this.status = 'UPSTREAM_ERROR';
      this.errorMessage = error.message;
      this.logger.warn(`Stream destroyed with error for ${this.requestId}: ${error.message}`);
    }
    this.emitMetrics();
    callback(error);
  }

  /**
   * Client went away. Cancels the backend stream.
   */
  handleClientAbort(): void {
    if (this.metricsEmitted) {
      return;
    }
    this.status = 'CLIENT_ABORT';
    this.logger.debug(`Client aborted stream ${this.requestId}`);
    this.destroy();
  }

  getMetrics(): StreamMetrics {
    return {
      requestId: this.requestId,
      ttfbMs: this.ttfbMs,
      totalLatencyMs: Date.now() - this.startTime,
      chunkCount: this.chunkCount,
      eventCount: this.eventCount,
      status: this.status,
      errorMessage: this.errorMessage,
    };
  }

  private consume(payloads: string[]): void {
    for (const payload of payloads) {
      let chunk: unknown;
      try {
        chunk = JSON.parse(payload);
      } catch {
        this.logger.debug(`Non-JSON SSE data: ${payload.slice(0, 100)}`);
        continue;
      }
      this.chunkCount++;
      this.emitEvents(this.translator.push(chunk));
    }
  }

  private emitEvents(events: StreamEvent[]): void {
    for (const event of events) {
      this.eventCount++;
      this.push(encodeEvent(event));
    }
  }

  /**
   * Stop reading the backend, emit the error event and end the client stream.
   */
  private fail(status: StreamStatus, error: StreamError): void {
    if (this.writableEnded || this.destroyed) {
      return;
    }
    this.clearTimeout();
    this.status = status;
    this.errorMessage = error.message;
    this.logger.warn(`Stream ${status.toLowerCase()} for ${this.requestId}: ${error.message}`);

    if (this.source) {
      this.source.unpipe(this);
      this.source.destroy();
    }
    this.emitEvents(this.translator.abort(error.message));
    this.end();
  }

  /**
   * `[DONE]` seen: stop reading even if the backend keeps the body open.
   */
  private releaseSource(): void {
    if (this.writableEnded || this.destroyed) {
      return;
    }
    if (this.source) {
      this.source.unpipe(this);
      this.source.destroy();
    }
    this.end();
  }

  private clearTimeout(): void {
    if (this.timeoutHandle) {
      clearTimeout(this.timeoutHandle);
      this.timeoutHandle = undefined;
    }
  }

  private emitMetrics(): void {
    if (this.metricsEmitted) {
      return;
    }
    this.metricsEmitted = true;

    const metrics = this.getMetrics();
    this.logger.debug(
      `Stream metrics for ${this.requestId}: TTFB=${this.ttfbMs}ms, chunks=${this.chunkCount}, events=${this.eventCount}, status=${this.status}`,
    );
    this.onMetrics?.(metrics);
  }
}

/**
 * Create a translating stream around an upstream readable
 */
export function wrapStream(
  upstream: Readable,
  requestId: string,
  translator: StreamTranslator,
  options: StreamWrapperOptions,
): MessagesStream {
  return new MessagesStream(requestId, translator, options).attach(upstream);
}
