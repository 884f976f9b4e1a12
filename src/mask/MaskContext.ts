import type { BitCursor } from '../BitCursor';
import { gnssIdToSatsys, satelliteName, signalName } from '../fields/FieldCodec';
import { setPositions } from '../helpers';
import type { SatSys } from '../types';

export type MaskKind = 'cssr' | 'has';

/** Addressing for one satellite system of a mask message. */
export interface SystemMask {
  satsys: SatSys;
  /** 1-indexed positions of the set bits of the 40-bit satellite mask. */
  satelliteIds: number[];
  /** "G01"-style names, same order as `satelliteIds`. */
  satellites: string[];
  /** Bit positions of the set bits of the 16-bit signal mask. */
  signalIndices: number[];
  signals: string[];
  /** `satellites.length * signals.length` flags, satellite-major. */
  cellMask: boolean[];
  /** HAS navigation message field; 0 for Galileo I/NAV and GPS LNAV. */
  navMessage?: number;
}

export interface SatelliteRef {
  system: SystemMask;
  satIndex: number;
  satellite: string;
}

export interface CellRef extends SatelliteRef {
  sigIndex: number;
  signal: string;
}

/**
 * Satellite, signal and cell addressing established by a CSSR subtype 1 or
 * HAS mask message. Read-only once built; every later correction message
 * of the stream walks it in the same order.
 */
export class MaskContext {
  readonly kind: MaskKind;
  readonly systems: readonly SystemMask[];
  readonly maskId: number | undefined;

  constructor(kind: MaskKind, systems: readonly SystemMask[], maskId?: number) {
    this.kind = kind;
    this.systems = systems;
    this.maskId = maskId;
  }

  get satsys(): SatSys[] {
    return this.systems.map(s => s.satsys);
  }

  system(satsys: SatSys): SystemMask | undefined {
    return this.systems.find(s => s.satsys === satsys);
  }

  satIds(satsys: SatSys): number[] {
    return this.system(satsys)?.satelliteIds ?? [];
  }

  signalNames(satsys: SatSys): string[] {
    return this.system(satsys)?.signals ?? [];
  }

  cellMask(satsys: SatSys): boolean[] {
    return this.system(satsys)?.cellMask ?? [];
  }

  get satelliteCount(): number {
    return this.systems.reduce((n, s) => n + s.satellites.length, 0);
  }

  /** Number of set cells across all systems. */
  get activeCellCount(): number {
    return [...this.cells()].length;
  }

  /** Satellites in mask order: system, then ascending satellite id. */
  *satellites(): Generator<SatelliteRef> {
    for (const system of this.systems) {
      for (let satIndex = 0; satIndex < system.satellites.length; satIndex++) {
        yield { system, satIndex, satellite: system.satellites[satIndex] };
      }
    }
  }

  /** Active cells: outer loop satellite, inner loop signal. */
  *cells(): Generator<CellRef> {
    for (const system of this.systems) {
      const nsig = system.signals.length;
      for (let satIndex = 0; satIndex < system.satellites.length; satIndex++) {
        for (let sigIndex = 0; sigIndex < nsig; sigIndex++) {
          if (!system.cellMask[satIndex * nsig + sigIndex]) continue;
          yield {
            system,
            satIndex,
            satellite: system.satellites[satIndex],
            sigIndex,
            signal: system.signals[sigIndex],
          };
        }
      }
    }
  }
}

export interface MaskDecode {
  mask: MaskContext;
  trace: string;
  warnings: string[];
}

const GNSS_BLOCK_BITS = 4 + 40 + 16 + 1;

/**
 * Build a {@link MaskContext} from the body of a CSSR subtype 1 or HAS mask
 * block. The cursor must sit on the GNSS count field.
 */
export function decodeMask(cursor: BitCursor, kind: MaskKind, maskId?: number): MaskDecode {
  const ngnss = cursor.readUnsigned(4);
  const systems: SystemMask[] = [];
  for (let i = 0; i < ngnss; i++) {
    cursor.require(GNSS_BLOCK_BITS);
    const satsys = gnssIdToSatsys(cursor.readUnsigned(4));
    const satelliteIds = setPositions(cursor.readFlags(40), 1);
    const signalIndices = setPositions(cursor.readFlags(16));
    const cellMaskAvailable = cursor.readBit() === 1;
    const ncell = satelliteIds.length * signalIndices.length;
    const cellMask = cellMaskAvailable
      ? cursor.readFlags(ncell)
      : new Array<boolean>(ncell).fill(true);
    const system: SystemMask = {
      satsys,
      satelliteIds,
      satellites: satelliteIds.map(id => satelliteName(satsys, id)),
      signalIndices,
      signals: signalIndices.map(index => signalName(satsys, index)),
      cellMask,
    };
    if (kind === 'has') system.navMessage = cursor.readUnsigned(3);
    systems.push(system);
  }
  if (kind === 'has') cursor.skip(6);

  const mask = new MaskContext(kind, systems, maskId);
  const label = kind === 'cssr' ? 'ST1' : 'MASK';
  let trace = '';
  const warnings: string[] = [];
  for (const system of systems) {
    const nsig = system.signals.length;
    system.satellites.forEach((satellite, satIndex) => {
      trace += `${label} ${satellite}`;
      system.signals.forEach((signal, sigIndex) => {
        if (system.cellMask[satIndex * nsig + sigIndex]) trace += ` ${signal}`;
      });
      trace += '\n';
    });
    if (system.navMessage !== undefined && system.navMessage !== 0) {
      const warning = `HAS NM is not zero (${system.satsys}: ${system.navMessage})`;
      warnings.push(warning);
      trace += `Warning: ${warning}.\n`;
    }
  }
  return { mask, trace, warnings };
}
