import { SteamRequestError, type AppDetailsEntry, type SteamApiClient } from '../scripts/steam_api_client.js';
import { errorMessage, taggedLogger, type Logger } from '../shared/logger.js';
import type { PriceSnapshot } from '../subscriptions/subscription_store.js';

export const FREE_CURRENCY = 'FREE';

export type UnavailableReason = 'not_found' | 'no_price' | 'transport' | 'format';

export type PriceLookup = { status: 'ok'; snapshot: PriceSnapshot } | { status: 'unavailable'; reason: UnavailableReason };

export interface PriceSource {
  fetchPrice(appid: string | number, region: string): Promise<PriceLookup>;
}

type DetailsClient = Pick<SteamApiClient, 'fetchAppDetails'>;

export class SteamPriceSource implements PriceSource {
  private readonly logger: Logger;

  constructor(
    private readonly client: DetailsClient,
    private readonly options: { language?: string; logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? taggedLogger('prices');
  }

  async fetchPrice(appid: string | number, region: string): Promise<PriceLookup> {
    let entry: AppDetailsEntry | null;
    try {
      entry = await this.client.fetchAppDetails(appid, region, this.options.language ?? 'english');
    } catch (error) {
      const reason: UnavailableReason = error instanceof SteamRequestError && error.kind === 'FORMAT' ? 'format' : 'transport';
      const kind = error instanceof SteamRequestError ? ` [${error.kind}]` : '';
      this.logger.error(`Price lookup for ${appid}/${region} failed${kind}: ${errorMessage(error)}`);
      return { status: 'unavailable', reason };
    }

    if (!entry || !entry.success || !entry.data) {
      this.logger.warn(`App ${appid} returned no store data for region ${region}.`);
      return { status: 'unavailable', reason: 'not_found' };
    }

    if (entry.data.is_free) {
      return {
        status: 'ok',
        snapshot: { currentPrice: 0, originalPrice: 0, discountPercent: 100, isFree: true, currency: FREE_CURRENCY },
      };
    }

    const overview = entry.data.price_overview;
    if (!overview) {
      // Typical for unreleased titles and apps not sold in this region.
      this.logger.info(`"${entry.data.name ?? appid}" has no price in region ${region}.`);
      return { status: 'unavailable', reason: 'no_price' };
    }

    return {
      status: 'ok',
      snapshot: {
        currentPrice: overview.final / 100,
        originalPrice: overview.initial / 100,
        discountPercent: overview.discount_percent,
        isFree: false,
        currency: overview.currency,
      },
    };
  }
}
