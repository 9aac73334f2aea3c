import { getApiData } from './api-data.js';
import { syncCreatives } from './adcp/creatives.js';
import { createMediaBuy, getMediaBuyDelivery, getProducts } from './adcp/media-buy.js';
import { getProperties } from './adcp/properties.js';
import { activateSignal, discoverSignals } from './adcp/signals.js';
import { bookAd } from './legacy/book-ad.js';
import { getAdbreaks, getChannels, getEpgShows, getInventory } from './legacy/lookups.js';
import type { ToolSpec } from './types.js';

export { formatDate } from './types.js';
export type { BuildContext, TimeoutConfig } from './types.js';

/** Tool name → request builder. Registration order follows this table. */
export const TOOLS = {
  // ADCP Media Buy
  get_products: getProducts,
  create_media_buy: createMediaBuy,
  get_media_buy_delivery: getMediaBuyDelivery,
  // ADCP Signals
  discover_signals: discoverSignals,
  activate_signal: activateSignal,
  // ADCP Creative
  sync_creatives: syncCreatives,
  // ADCP Property discovery
  get_properties: getProperties,
  // Legacy
  get_channels: getChannels,
  get_epg_shows: getEpgShows,
  get_adbreaks: getAdbreaks,
  get_inventory: getInventory,
  book_ad: bookAd,
  // Generic
  get_api_data: getApiData,
} satisfies Record<string, ToolSpec>;
