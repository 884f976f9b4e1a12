import type { MaskContext } from '../mask/MaskContext';
import type { BitUsage } from '../types';

export interface StatisticsSnapshot {
  satellites: number;
  signals: number;
  satelliteBits: number;
  signalBits: number;
  otherBits: number;
  nullBits: number;
  totalBits: number;
}

/**
 * Bit usage of a correction stream between two mask messages. A mask closes
 * the running period and opens the next one with its own bits as "other".
 */
export class BitStatistics {
  private satellites = 0;
  private signals = 0;
  private satelliteBits = 0;
  private signalBits = 0;
  private otherBits = 0;
  private nullBits = 0;

  add(usage: BitUsage): void {
    this.satelliteBits += usage.satellite;
    this.signalBits += usage.signal;
    this.otherBits += usage.other;
  }

  addOther(bits: number): void {
    this.otherBits += bits;
  }

  addNull(bits: number): void {
    this.nullBits += bits;
  }

  snapshot(): StatisticsSnapshot {
    return {
      satellites: this.satellites,
      signals: this.signals,
      satelliteBits: this.satelliteBits,
      signalBits: this.signalBits,
      otherBits: this.otherBits,
      nullBits: this.nullBits,
      totalBits: this.satelliteBits + this.signalBits + this.otherBits + this.nullBits,
    };
  }

  /** Close the running period and start a new one for `mask`. */
  restart(mask: MaskContext, maskBits: number): StatisticsSnapshot {
    const closed = this.snapshot();
    this.satellites = mask.satelliteCount;
    this.signals = mask.activeCellCount;
    this.satelliteBits = 0;
    this.signalBits = 0;
    this.otherBits = maskBits;
    this.nullBits = 0;
    return closed;
  }
}

export function formatStatistics(s: StatisticsSnapshot): string {
  return (
    `stat n_sat ${s.satellites} n_sig ${s.signals} ` +
    `bit_sat ${s.satelliteBits} bit_sig ${s.signalBits} ` +
    `bit_other ${s.otherBits} bit_null ${s.nullBits} ` +
    `bit_total ${s.totalBits}`
  );
}
