import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import { getNumberSetting } from '../common/config-values';
import { debugLog } from '../common/debug-logger';
import { errorMessage, FetchError } from '../common/errors';

const USER_AGENT = 'paper-figures/0.1';

@Injectable()
export class HttpFetchService {
  private readonly logger = new Logger(HttpFetchService.name);
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = getNumberSetting(this.configService, 'HTTP_TIMEOUT_MS', 30000);
    this.maxRetries = Math.max(1, Math.floor(getNumberSetting(this.configService, 'HTTP_MAX_RETRIES', 3)));
    this.retryBaseDelayMs = getNumberSetting(this.configService, 'HTTP_RETRY_BASE_DELAY_MS', 1000);
  }

  /**
   * GET url as raw bytes. Retries with exponential backoff and throws
   * FetchError once the attempts are used up or the server answers with a
   * client error other than 408/429.
   */
  async fetchBytes(url: string, timeoutMs: number = this.timeoutMs): Promise<Buffer> {
    let lastError: unknown;
    let attempts = 0;

    while (attempts < this.maxRetries) {
      attempts++;
      try {
        const response = await axios.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          timeout: timeoutMs,
          headers: { 'User-Agent': USER_AGENT },
        });
        debugLog(`Fetched ${url} on attempt ${attempts}`);
        return Buffer.from(response.data);
      } catch (error) {
        lastError = error;
        this.logger.warn(`Fetch attempt ${attempts}/${this.maxRetries} failed for ${url}: ${errorMessage(error)}`);

        if (!this.isRetryable(error)) {
          break;
        }
        if (attempts < this.maxRetries) {
          await sleep(this.retryBaseDelayMs * 2 ** (attempts - 1));
        }
      }
    }

    throw new FetchError(url, attempts, { cause: lastError });
  }

  async fetchText(url: string, timeoutMs?: number): Promise<string> {
    const bytes = await this.fetchBytes(url, timeoutMs);
    return bytes.toString('utf-8');
  }

  private isRetryable(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
      return true;
    }
    const status = error.response?.status;
    if (status === undefined) {
      return true;
    }
    return status >= 500 || status === 408 || status === 429;
  }
}
