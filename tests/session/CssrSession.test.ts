import { BitWriter } from '../../src/BitWriter';
import type { Logger } from '../../src/config';
import { createCssrSession, decodeCssrMessage } from '../../src/session/CssrSession';
import { GPS_ONE_CELL, cssrHeader, expectOk, writeMaskBody } from '../fixtures/payloads';

function maskMessage(epoch = 100, iod = 2): Uint8Array {
  return writeMaskBody(cssrHeader(1, { epoch, iod }), [GPS_ONE_CELL]).toUint8Array();
}

function orbitMessage(iod = 2): Uint8Array {
  return cssrHeader(2, { hourlyEpoch: 30, iod })
    .writeUnsigned(5, 8)
    .writeSigned(1, 15)
    .writeSigned(0, 13)
    .writeSigned(0, 13)
    .toUint8Array();
}

function mockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn() };
}

describe('decodeCssrMessage', () => {
  it('refuses corrections before the first mask', () => {
    const logger = mockLogger();
    const session = createCssrSession({ logger });
    expect(decodeCssrMessage(session, orbitMessage())).toEqual({
      status: 'sequencing-error',
      message: 'CSSR ST2 before ST1 mask',
    });
    expect(session.phase).toBe('mask-required');
    expect(logger.warn).toHaveBeenCalledWith('CSSR ST2 before ST1 mask');
  });

  it('stores the subtype 1 mask and decodes corrections against it', () => {
    const session = createCssrSession();
    const mask = expectOk(decodeCssrMessage(session, maskMessage()));

    expect(mask.bitLength).toBe(45 + 65);
    expect(mask.summary).toBe('ST1  epoch=100 iod=2');
    expect(mask.trace).toBe('ST1 G01 L1 C/A\n');
    expect(session.phase).toBe('mask-ready');
    expect(session.mask).toBe(mask.message.mask);

    const orbit = expectOk(decodeCssrMessage(session, orbitMessage()));
    expect(orbit.bitLength).toBe(37 + 8 + 15 + 13 + 13);
    expect(orbit.summary).toBe('ST2  hepoch=  30 iod=2');
    expect(orbit.message.records).toEqual([
      { kind: 'orbit', satellite: 'G01', iode: 5, radial: 0.0016, along: 0, cross: 0 },
    ]);
    expect(session.header).toEqual({
      messageNumber: 4073,
      subtype: 2,
      hourlyEpoch: 30,
      interval: 0,
      multipleMessage: false,
      iod: 2,
    });
  });

  it('decodes the same bytes the same way in fresh sessions', () => {
    const first = createCssrSession();
    const second = createCssrSession();
    decodeCssrMessage(first, maskMessage());
    decodeCssrMessage(second, maskMessage());
    expect(decodeCssrMessage(first, orbitMessage())).toEqual(decodeCssrMessage(second, orbitMessage()));
  });

  it('reports an unknown subtype and keeps the stored mask', () => {
    const session = createCssrSession();
    decodeCssrMessage(session, maskMessage());
    const stored = session.mask;

    expect(decodeCssrMessage(session, cssrHeader(13, { hourlyEpoch: 1 }).toUint8Array())).toEqual({
      status: 'unknown-enumeration',
      field: 'CSSR subtype',
      value: 13,
    });
    expect(session.mask).toBe(stored);
  });

  it('keeps the previous mask when a mask message is cut short', () => {
    const session = createCssrSession();
    decodeCssrMessage(session, maskMessage());
    const stored = session.mask;

    expect(decodeCssrMessage(session, maskMessage(200), { bitLength: 100 })).toEqual({
      status: 'insufficient-data',
      bitOffset: 49,
      needed: 61,
      available: 51,
    });
    expect(session.mask).toBe(stored);
  });

  it('decodes subtype 10 without a mask', () => {
    const session = createCssrSession();
    const w = cssrHeader(10).writeUnsigned(1, 3).writeUnsigned(0, 2).writeUnsigned(0xab, 8).writeUnsigned(0, 32);
    const decoded = expectOk(decodeCssrMessage(session, w.toUint8Array()));

    expect(decoded.summary).toBe('ST10');
    expect(decoded.trace).toBe('ST10 1:ab00000000\n');
    expect(decoded.bitLength).toBe(16 + 5 + 40);
    expect(session.phase).toBe('mask-required');
  });

  it('treats an all-zero payload as padding', () => {
    const session = createCssrSession({ statistics: true });
    expect(decodeCssrMessage(session, new Uint8Array(8))).toEqual({
      status: 'null-data',
      reason: 'zero-padding',
      bitLength: 64,
    });
    expect(session.stats?.snapshot().nullBits).toBe(64);
  });

  it('skips a foreign message number', () => {
    const session = createCssrSession();
    const data = new BitWriter().writeUnsigned(1005, 12).writeUnsigned(0, 20).toUint8Array();
    expect(decodeCssrMessage(session, data)).toEqual({
      status: 'null-data',
      reason: 'message-number',
      bitLength: 32,
      messageNumber: 1005,
    });
  });

  it('reports a header one bit short', () => {
    const session = createCssrSession();
    const data = cssrHeader(2, { hourlyEpoch: 30, iod: 1 }).toUint8Array();
    expect(decodeCssrMessage(session, data, { bitLength: 36 })).toEqual({
      status: 'insufficient-data',
      bitOffset: 33,
      needed: 4,
      available: 3,
    });
  });

  it('reads a message at a bit offset within a larger buffer', () => {
    const session = createCssrSession();
    const w = new BitWriter().writeUnsigned(0b101, 3);
    writeMaskBody(w.writeUnsigned(4073, 12).writeUnsigned(1, 4).writeUnsigned(7, 20).writeUnsigned(0, 9), [
      GPS_ONE_CELL,
    ]);
    const decoded = expectOk(decodeCssrMessage(session, w.toUint8Array(), { bitOffset: 3, bitLength: 110 }));
    expect(decoded.message.header.epoch).toBe(7);
    expect(decoded.bitLength).toBe(110);
  });

  it('closes a statistics period with each mask', () => {
    const logger = mockLogger();
    const session = createCssrSession({ statistics: true, logger });

    const first = expectOk(decodeCssrMessage(session, maskMessage()));
    expect(first.message.statistics?.totalBits).toBe(0);
    expect(logger.info).toHaveBeenLastCalledWith(
      'stat n_sat 0 n_sig 0 bit_sat 0 bit_sig 0 bit_other 0 bit_null 0 bit_total 0',
    );

    expectOk(decodeCssrMessage(session, orbitMessage()));
    const second = expectOk(decodeCssrMessage(session, maskMessage()));
    expect(second.message.statistics).toEqual({
      satellites: 1,
      signals: 1,
      satelliteBits: 49,
      signalBits: 0,
      otherBits: 110 + 37,
      nullBits: 0,
      totalBits: 196,
    });
    expect(logger.info).toHaveBeenLastCalledWith(
      'stat n_sat 1 n_sig 1 bit_sat 49 bit_sig 0 bit_other 147 bit_null 0 bit_total 196',
    );
  });
});
