/**
 * 数据推送客户端
 * 基于原生 fetch，POST JSON 到服务端 /data
 *
 * 推送失败（网络错误、超时、非 2xx）只记录日志并返回 null，不抛入采集循环
 */

import { createModuleLogger } from '../../core/logger';
import type { BatchPayload, IndividualPayload } from '../../../shared/sensorTypes';

const log = createModuleLogger('data-poster');

export interface DataPosterOptions {
  /** 请求超时（毫秒），默认 5000 */
  timeoutMs?: number;
  path?: string;
}

export interface PostResult {
  status: number;
  body: unknown;
}

export class DataPoster {
  readonly url: string;
  private readonly timeoutMs: number;

  constructor(serverUrl: string, options: DataPosterOptions = {}) {
    this.url = `${serverUrl.replace(/\/+$/, '')}${options.path ?? '/data'}`;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async post(payload: IndividualPayload | BatchPayload): Promise<PostResult | null> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const contentType = response.headers.get('content-type') || '';
      const body: unknown = contentType.includes('json') ? await response.json() : await response.text();

      if (!response.ok) {
        log.warn({ status: response.status, body, url: this.url }, 'Server rejected posted data');
        return null;
      }

      log.debug({ status: response.status }, 'Posted data');
      return { status: response.status, body };
    } catch (err) {
      log.warn({ url: this.url, error: err instanceof Error ? err.message : String(err) }, 'Error posting data');
      return null;
    }
  }
}
