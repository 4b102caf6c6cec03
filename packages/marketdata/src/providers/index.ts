/**
 * Vendor Providers
 */

export {
	ALPACA_DATA_URL,
	ALPACA_STREAM_BASE_URL,
	ALPACA_VENDOR,
	type AlpacaFeed,
	AlpacaFeedSchema,
	type AlpacaOptionsFeed,
	AlpacaOptionsFeedSchema,
	mapAlpacaBar,
	mapAlpacaOptionSnapshot,
	mapAlpacaQuote,
	type MapResult,
	toAlpacaTimeframe,
} from "./alpaca.js";
export { AlpacaProvider, type AlpacaProviderOptions, normalizeSymbol } from "./alpaca-provider.js";
export { ALPACA_WS_ERROR_CODES, AlpacaStreamProtocol } from "./alpaca-stream.js";
export { ETRADE_VENDOR, ETradeProvider, type ETradeProviderOptions } from "./etrade.js";
