// Regional profiles of the vendor API. Each one is a plain value selected by
// configuration; clients and the order builder read from it.

export type Market = 'CA' | 'US';

export interface MarketProfile {
  market: Market;
  baseUrl: string;
  trackerUrl: string;
  headers: Record<string, string>;
  country: string;
  // written onto every order body
  orderFields: {
    Market: string;
    Currency: string;
    LanguageCode: string;
    SourceOrganizationURI: string;
  };
}

const MARKET_PROFILES: Record<Market, MarketProfile> = {
  CA: {
    market: 'CA',
    baseUrl: 'https://order.dominos.ca/power',
    trackerUrl: 'https://order.dominos.ca/orderstorage/GetTrackerData',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      Referer: 'https://order.dominos.ca/en/pages/order/',
      'DPZ-Market': 'CANADA',
      'DPZ-Language': 'en',
      Market: 'CANADA',
    },
    country: 'ca',
    orderFields: {
      Market: 'CANADA',
      Currency: 'CAD',
      LanguageCode: 'en',
      SourceOrganizationURI: 'order.dominos.ca',
    },
  },
  US: {
    market: 'US',
    baseUrl: 'https://order.dominos.com/power',
    trackerUrl: 'https://tracker.dominos.com/tracker-presentation-service/v2/orders',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      Referer: 'https://order.dominos.com/en/pages/order/',
    },
    country: 'us',
    orderFields: {
      Market: 'UNITED_STATES',
      Currency: 'USD',
      LanguageCode: 'en',
      SourceOrganizationURI: 'order.dominos.com',
    },
  },
};

export function getMarketProfile(market: Market): MarketProfile {
  return MARKET_PROFILES[market];
}
