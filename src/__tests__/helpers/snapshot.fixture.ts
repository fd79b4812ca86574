/**
 * Hand-built indicator snapshots; unspecified readings are ABSENT.
 */

import { absent, present } from '../../common/reading.js';
import type {
  BollingerValue,
  IndicatorSnapshot,
  MacdValue,
  MaCrossover,
  MovingAveragesValue,
  RciTriple,
  StochasticValue,
} from '../../modules/indicators/indicator.types.js';

export interface SnapshotValues {
  rsi?: number;
  piRatio?: number;
  rci?: RciTriple;
  lastClose?: number;
  maLong?: number;
  maCrossover?: MaCrossover;
  macd?: MacdValue;
  bollinger?: BollingerValue;
  stochastic?: StochasticValue;
}

const MISSING = 'not provided';

export function snapshotWith(values: SnapshotValues, assetId = 'bitcoin'): IndicatorSnapshot {
  const { rsi, piRatio, rci, lastClose, maLong, maCrossover = 'NONE', macd, bollinger, stochastic } = values;
  return {
    assetId,
    ts: 1_700_000_000_000,
    points: 400,
    lastClose: lastClose === undefined ? absent(MISSING) : present(lastClose),
    rsi: rsi === undefined ? absent(MISSING) : present(rsi),
    macd: macd === undefined ? absent(MISSING) : present(macd),
    movingAverages:
      maLong === undefined
        ? absent(MISSING)
        : present<MovingAveragesValue>({ short: maLong, long: maLong, crossover: maCrossover }),
    piCycle:
      piRatio === undefined
        ? absent(MISSING)
        : present({ ma111: piRatio * 2, ma350x2: 2, ratio: piRatio, aboveTrigger: piRatio >= 1, crossedUp: false }),
    rci: rci === undefined ? absent(MISSING) : present(rci),
    bollinger: bollinger === undefined ? absent(MISSING) : present(bollinger),
    stochastic: stochastic === undefined ? absent(MISSING) : present(stochastic),
  };
}
