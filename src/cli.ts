import 'dotenv/config';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { GoogleGenAI } from '@google/genai';
import { loadConfig, type AppConfig } from './config';
import { MarketDataClient } from './services/marketDataClient';
import { GeminiPeerSuggester, StaticPeerSuggester } from './services/peerSuggester';
import { chartFileName, renderFootballField } from './services/chartRenderer';
import { runValuation } from './services/valuationService';
import type { PeerSuggester } from './types';
import { priceRanges } from './utils/equityBridge';
import { TargetUnavailableError, describeError } from './utils/errors';
import { formatBillions, formatPrice, formatRangeTable } from './utils/format';

const USAGE = 'Usage: valuation <TARGET_TICKER_OR_NAME> [--peers N] [--comps T1,T2,...] [--out DIR]';

const buildPeerSuggester = (config: AppConfig, comps: string | undefined): PeerSuggester => {
  if (comps) {
    return new StaticPeerSuggester(comps.split(','));
  }
  if (!config.geminiApiKey) {
    console.warn('GEMINI_API_KEY not set and no --comps given; running without peers');
    return new StaticPeerSuggester([]);
  }
  const ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  return new GeminiPeerSuggester(ai.models, config.geminiModel);
};

const parseCli = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      peers: { type: 'string' },
      comps: { type: 'string' },
      out: { type: 'string', default: '.' }
    }
  });

const main = async (argv: string[]): Promise<number> => {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 1;
  }

  const [target] = parsed.positionals;
  if (!target) {
    console.error(USAGE);
    return 1;
  }

  const config = loadConfig();
  const peerCount = parsed.values.peers ? Number(parsed.values.peers) : config.peerCount;
  if (!Number.isInteger(peerCount) || peerCount < 1) {
    console.error(`--peers must be a positive integer, got ${parsed.values.peers}`);
    return 1;
  }

  console.log(`Target: ${target}`);
  const result = await runValuation(target, {
    marketData: new MarketDataClient({ baseUrl: config.apiBaseUrl, timeoutMs: config.requestTimeoutMs }),
    peerSuggester: buildPeerSuggester(config, parsed.values.comps),
    peerCount
  });

  const ticker = result.target.ticker;
  console.log('Proposed comps:', result.suggestedPeers.join(', ') || '(none)');
  console.log(`Peers used after hygiene filtering: ${result.peers.map((peer) => peer.ticker).join(', ') || '(none)'}`);

  console.log('\nImplied enterprise value ranges:');
  console.table(formatRangeTable(result.ranges));
  console.log('Implied price per share:');
  console.table(formatRangeTable(priceRanges(result.ranges, result.target), formatPrice));

  console.log(`\nSpot EV: ${ticker} = ${formatBillions(result.spotEnterpriseValue)}`);
  console.log(`Spot price: ${ticker} = ${formatPrice(result.target.price)}`);

  const outDir = parsed.values.out ?? '.';
  await mkdir(outDir, { recursive: true });
  const outPath = path.join(outDir, chartFileName(ticker));
  await writeFile(
    outPath,
    renderFootballField({
      title: `${ticker} Football Field (Enterprise Value)`,
      ranges: result.ranges,
      spotEnterpriseValue: result.spotEnterpriseValue
    }),
    'utf8'
  );
  console.log(`Saved chart -> ${outPath}`);
  return 0;
};

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof TargetUnavailableError) {
      console.error(error.message);
    } else {
      console.error('Valuation run failed:', error);
    }
    process.exitCode = 1;
  });
