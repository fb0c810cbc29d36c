import logger from '../utils/logger';
import { FetchError } from '../utils/errors';
import { classifyHttpError, type HttpGetter } from '../utils/httpClient';
import type { PositionRecord } from '../types/flight.types';
import { openSkyStatesSchema, type OpenSkyStatesResponse } from '../schemas/opensky.schemas';
import { mapStateVector, stateCallsign } from '../utils/stateVector';

export interface OpenSkyClientOptions {
  baseUrl: string;
  user?: string;
  pass?: string;
  http: HttpGetter;
}

/**
 * Live position lookups against the OpenSky Network REST API.
 * Anonymous access works against a small daily quota; credentials raise it.
 */
export class OpenSkyClient {
  private readonly baseUrl: string;

  private readonly user?: string;

  private readonly pass?: string;

  private readonly http: HttpGetter;

  constructor(options: OpenSkyClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.user = options.user;
    this.pass = options.pass;
    this.http = options.http;
  }

  hasCredentials(): boolean {
    return Boolean(this.user && this.pass);
  }

  private getAuthHeader(): { Authorization?: string } {
    if (!this.user || !this.pass) {
      return {};
    }
    const auth = Buffer.from(`${this.user}:${this.pass}`).toString('base64');
    return { Authorization: `Basic ${auth}` };
  }

  /**
   * Finds the state vector broadcasting `icaoCallsign`.
   * Throws FetchError('NotFound') when no aircraft uses that callsign.
   */
  async lookupPosition(icaoCallsign: string): Promise<PositionRecord> {
    const wanted = icaoCallsign.trim().toUpperCase();

    let data: OpenSkyStatesResponse;
    try {
      const response = await this.http.get(`${this.baseUrl}/states/all`, {
        headers: this.getAuthHeader(),
      });
      const parsed = openSkyStatesSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.warn('Malformed OpenSky response', {
          callsign: wanted,
          issues: parsed.error.issues.slice(0, 3).map((issue) => issue.message),
        });
        throw new FetchError('Unavailable', 'Malformed OpenSky response');
      }
      data = parsed.data;
    } catch (error) {
      throw classifyHttpError(error);
    }

    const state = (data.states ?? []).find((candidate) => stateCallsign(candidate) === wanted);
    if (!state) {
      logger.debug('No OpenSky state vector for callsign', {
        callsign: wanted,
        states: data.states?.length ?? 0,
      });
      throw new FetchError('NotFound', `No live position for ${wanted}`);
    }

    return mapStateVector(state);
  }
}
