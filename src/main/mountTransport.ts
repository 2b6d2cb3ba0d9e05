import axios, { type AxiosInstance } from 'axios';
import { CommunicationError } from '../common/errors';
import { logWarn } from './logger';
import { type ScanReply, extractPayload, isScanFormat, scanReply } from './replyScanner';

export const ILLEGAL_STATE_REPLY = 'ERROR:ILLEGAL STATE';

export interface RequestOptions {
  timeoutMs?: number;
}

export interface MountTransport {
  readonly address: string;
  send(command: string, options?: RequestOptions): Promise<string>;
  sendAndScan(command: string, expected: string, options?: RequestOptions): Promise<ScanReply>;
  fetchBinary(command: string, options?: RequestOptions): Promise<Uint8Array>;
}

export interface TransportOptions {
  address: string;
  timeoutMs: number;
  client?: AxiosInstance;
}

export abstract class BaseMountTransport implements MountTransport {
  constructor(readonly address: string) {}

  abstract send(command: string, options?: RequestOptions): Promise<string>;
  abstract fetchBinary(command: string, options?: RequestOptions): Promise<Uint8Array>;

  /**
   * Sends a command and checks its reply. A format with `%` conversions is
   * scanned from the `<!-- -->` payload; any other string is an expected
   * literal, and a mismatch comes back as the reply text instead of throwing.
   */
  async sendAndScan(command: string, expected: string, options?: RequestOptions): Promise<ScanReply> {
    const reply = await this.send(command, options);
    if (isScanFormat(expected)) {
      return scanReply(reply, expected);
    }
    if (!expected || reply.includes(expected)) {
      return expected;
    }

    logWarn('unexpected_reply', { command, expected, reply });
    if (reply.includes('ILLEGAL STATE')) {
      return ILLEGAL_STATE_REPLY;
    }
    return (extractPayload(reply) ?? reply).trim();
  }

  protected commandUrl(command: string): string {
    return `http://${this.address}/${command}`;
  }
}

class HttpMountTransport extends BaseMountTransport {
  private http: AxiosInstance;
  private timeoutMs: number;

  constructor(options: TransportOptions) {
    super(options.address);
    this.timeoutMs = options.timeoutMs;
    this.http = options.client ?? axios.create({ baseURL: `http://${options.address}/` });
  }

  async send(command: string, options?: RequestOptions): Promise<string> {
    try {
      const res = await this.http.get<string>(command, {
        timeout: options?.timeoutMs ?? this.timeoutMs,
        responseType: 'text',
        transformResponse: (data: unknown) => data
      });
      return typeof res.data === 'string' ? res.data : String(res.data);
    } catch (err) {
      throw new CommunicationError(this.commandUrl(command), { cause: err });
    }
  }

  async fetchBinary(command: string, options?: RequestOptions): Promise<Uint8Array> {
    try {
      const res = await this.http.get<ArrayBuffer>(command, {
        timeout: options?.timeoutMs ?? this.timeoutMs,
        responseType: 'arraybuffer'
      });
      return new Uint8Array(res.data);
    } catch (err) {
      throw new CommunicationError(this.commandUrl(command), { cause: err });
    }
  }
}

export function createMountTransport(options: TransportOptions): MountTransport {
  return new HttpMountTransport(options);
}
