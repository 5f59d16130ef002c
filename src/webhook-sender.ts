import axios from 'axios';
import type { WebhookMetadata, WebhookPayload } from '../shared/types.js';
import { describeError } from './errors.js';
import type { MdmLogger } from './logger.js';
import { SystemInfo } from './system-info.js';

const DEFAULT_TIMEOUT_MS = 10000;

export interface WebhookSenderOptions {
  url: string;
  logger?: MdmLogger;
  /** Added as `script_name` unless the caller passes one. */
  scriptName?: string;
  /** Lines of the logger's file to attach as `log_tail`. Off when 0. */
  logTailLines?: number;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * Posts a JSON status report to a webhook. Delivery is best effort: failures
 * are logged and reported through the return value, never thrown.
 */
export class WebhookSender {
  private readonly options: WebhookSenderOptions;

  constructor(options: WebhookSenderOptions) {
    this.options = options;
  }

  async buildPayload(metadata: WebhookMetadata = {}): Promise<WebhookPayload> {
    const payload: WebhookPayload = { ...metadata };

    if (!('hostname' in payload)) {
      payload.hostname = SystemInfo.getHostname();
    }
    if (!('serial' in payload)) {
      payload.serial = await SystemInfo.getSerialNumber();
    }
    if (this.options.scriptName !== undefined && !('script_name' in payload)) {
      payload.script_name = this.options.scriptName;
    }

    const tailLines = this.options.logTailLines ?? 0;
    if (tailLines > 0 && this.options.logger && !('log_tail' in payload)) {
      payload.log_tail = this.options.logger.readTail(tailLines);
    }
    return payload;
  }

  async send(metadata: WebhookMetadata = {}): Promise<boolean> {
    const payload = await this.buildPayload(metadata);
    try {
      const response = await axios.post(this.options.url, payload, {
        timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: { 'Content-Type': 'application/json', ...this.options.headers },
      });
      this.options.logger?.debug(`Webhook delivered (HTTP ${response.status})`);
      return true;
    } catch (error) {
      this.options.logger?.error(`Webhook delivery failed: ${describeWebhookError(error)}`);
      return false;
    }
  }
}

function describeWebhookError(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    return `HTTP ${error.response.status} ${error.response.statusText}`.trim();
  }
  return describeError(error);
}
