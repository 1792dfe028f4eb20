import { z } from 'zod';
import axios, { type AxiosInstance } from 'axios';
import { Agent } from 'node:https';
import { ConfigurationError } from './errors.js';
import type { DiscoveredDevice } from './types.js';

export const LIBRENMS_API_BASE_PATH = '/api/v0/';

export interface DiscoveryClient {
  listDevices(): Promise<DiscoveredDevice[]>;
}

export interface LibreNmsConnection {
  host: string;
  port: number;
  protocol: 'http' | 'https';
  apiKey: string;
  tlsVerify: boolean;
  timeoutMs?: number;
}

const devicesResponseSchema = z.object({
  status: z.literal('ok'),
  devices: z.array(z.record(z.unknown())),
});

export class LibreNmsClient implements DiscoveryClient {
  private baseURL: string;
  private http: AxiosInstance;

  constructor(connection: LibreNmsConnection) {
    const { host, port, protocol, apiKey, tlsVerify } = connection;
    this.baseURL = `${protocol}://${host}:${port}${LIBRENMS_API_BASE_PATH}`;
    this.http = axios.create({
      baseURL: this.baseURL,
      headers: { 'X-Auth-Token': apiKey, Accept: 'application/json' },
      timeout: connection.timeoutMs ?? 30000,
      httpsAgent: protocol === 'https' ? new Agent({ rejectUnauthorized: tlsVerify }) : undefined,
    });
  }

  async listDevices(): Promise<DiscoveredDevice[]> {
    const body = await this.get('devices');
    const result = devicesResponseSchema.safeParse(body);

    if (!result.success) {
      throw new ConfigurationError('LibreNMS API returned a non-ok status or no device list');
    }

    return result.data.devices;
  }

  private async get(endpoint: string): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(endpoint);
      return response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response ? ` (HTTP ${err.response.status})` : '';
        throw new ConfigurationError(
          `LibreNMS API request to ${this.baseURL}${endpoint} failed${status}: ${err.message}`
        );
      }
      throw err;
    }
  }
}
