import { AxiosInstance, AxiosResponse } from 'axios';
import { ScanError, describeError } from '../errors';
import { finalRequestPath } from '../http';
import { ScanOutcome } from '../types';

export const DEFAULT_SCANNER_URL = 'https://dprk-research.kmsec.uk/api/scanner/analyse/package';

// The scanner answers an unknown or expired key by redirecting here.
const LOGIN_PATH = '/login';

export class ScannerClient {
  private readonly scannerUrl: string;

  constructor(
    private readonly client: AxiosInstance,
    private readonly apiKey: string,
    scannerUrl: string = DEFAULT_SCANNER_URL
  ) {
    this.scannerUrl = scannerUrl.replace(/\/$/, '');
  }

  /**
   * Submits one package for analysis. Does not retry.
   */
  async dispatch(packageName: string): Promise<ScanOutcome> {
    const url = `${this.scannerUrl}/${encodeURIComponent(packageName)}`;

    let response: AxiosResponse;
    try {
      response = await this.client.get(url, {
        headers: {
          accept: 'application/json',
          authorization: this.apiKey
        },
        validateStatus: () => true
      });
    } catch (error) {
      return this.fail('transport', packageName, `sending to scanner: ${packageName}: ${describeError(error)}`, {
        cause: error
      });
    }

    // Checked before the status: the login page may answer with anything.
    if (finalRequestPath(response) === LOGIN_PATH) {
      return this.fail(
        'auth-redirect',
        packageName,
        `api key was rejected while sending ${packageName}: redirected to ${LOGIN_PATH}`,
        { status: response.status }
      );
    }

    if (response.status !== 200) {
      return this.fail(
        'unexpected-status',
        packageName,
        `unexpected status code ${response.status} from ${url}`,
        { status: response.status }
      );
    }

    console.log(`📤 sent to scanner: ${packageName}`);
    return { ok: true, packageName };
  }

  private fail(
    kind: ScanError['kind'],
    packageName: string,
    message: string,
    options: { status?: number; cause?: unknown }
  ): ScanOutcome {
    return { ok: false, error: new ScanError(kind, packageName, message, options) };
  }
}
