/**
 * Tests for the per-category state reducers.
 */

import {reduceRecord} from '../src/reducers';
import {createTestLogger} from './helpers';

describe('reduceRecord', () => {
  let log: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    log = createTestLogger();
  });

  describe('system', () => {
    it('uses ARM as state and reports both temperatures', () => {
      const result = reduceRecord(
        'system',
        {ID: '1', TEMP: {IN: '+21.0', OUT: '5.5'}, ARM: 'ARMED'},
        log.logger
      );

      expect(result).toEqual({
        state: 'ARMED',
        attributes: {temp_in: 21, temp_out: 5.5},
      });
    });

    it('keeps one temperature when the other is malformed', () => {
      const result = reduceRecord(
        'system',
        {ID: '1', TEMP: {IN: 'err', OUT: '-2.5'}},
        log.logger
      );

      expect(result).toEqual({
        state: 'unknown',
        attributes: {temp_in: null, temp_out: -2.5},
      });
      expect(log.error).toHaveBeenCalledWith(
        'Error converting TEMP.IN: invalid number "err"'
      );
    });

    it('ignores a TEMP field that is not an object', () => {
      const result = reduceRecord(
        'system',
        {ID: '1', TEMP: '21', ARM: 'D'},
        log.logger
      );

      expect(result.attributes).toEqual({temp_in: null, temp_out: null});
    });
  });

  describe('powerlines', () => {
    it('uses consumption as state', () => {
      const result = reduceRecord(
        'powerlines',
        {ID: '1', PCONS: '12.5', PPROD: '3', STATUS: 'on'},
        log.logger
      );

      expect(result).toEqual({
        state: 12.5,
        attributes: {Consumo: 12.5, Produzione: 3, Status: 'on'},
      });
    });

    it('falls back to STATUS when consumption is rejected', () => {
      const result = reduceRecord(
        'powerlines',
        {ID: '1', PCONS: '-5', STATUS: 'on'},
        log.logger
      );

      expect(result).toEqual({
        state: 'on',
        attributes: {Consumo: null, Produzione: null, Status: 'on'},
      });
      expect(log.error).not.toHaveBeenCalled();
    });

    it('keeps a zero reading as the state', () => {
      const result = reduceRecord(
        'powerlines',
        {ID: '1', PCONS: '0', STATUS: 'on'},
        log.logger
      );

      expect(result.state).toBe(0);
    });

    it('defaults the status to unknown', () => {
      const result = reduceRecord('powerlines', {ID: '1'}, log.logger);

      expect(result).toEqual({
        state: 'unknown',
        attributes: {Consumo: null, Produzione: null, Status: 'unknown'},
      });
    });
  });

  describe('domus', () => {
    it('prefers the temperature over STA', () => {
      const record = {ID: '1', T: '+19.2', H: '45', STA: 'ok'};
      const result = reduceRecord('domus', record, log.logger);

      expect(result).toEqual({
        state: 19.2,
        attributes: {
          ID: '1',
          T: '+19.2',
          H: '45',
          STA: 'ok',
          temperature: 19.2,
          humidity: 45,
        },
      });
      expect(record).toEqual({ID: '1', T: '+19.2', H: '45', STA: 'ok'});
    });

    it('falls back to STA without a temperature', () => {
      const result = reduceRecord('domus', {ID: '1', STA: 'ok'}, log.logger);

      expect(result.state).toBe('ok');
      expect(result.attributes.temperature).toBeNull();
      expect(result.attributes.humidity).toBeNull();
    });

    it('treats an empty temperature as absent', () => {
      const result = reduceRecord(
        'domus',
        {ID: '1', T: '', STA: 'ok'},
        log.logger
      );

      expect(result.state).toBe('ok');
      expect(log.error).not.toHaveBeenCalled();
    });

    it('logs a malformed humidity and keeps the temperature', () => {
      const result = reduceRecord(
        'domus',
        {ID: '1', T: '20', H: 'n/a'},
        log.logger
      );

      expect(result.state).toBe(20);
      expect(result.attributes.humidity).toBeNull();
      expect(log.error).toHaveBeenCalledWith(
        'Error converting H: invalid number "n/a"'
      );
    });
  });

  describe('partitions', () => {
    it('adds up ENC of the latest STAT entry', () => {
      const stat = [
        {VAL: [{ENC: '9'}]},
        {VAL: [{ENC: '1.5'}, {ENC: '2.5'}]},
      ];
      const result = reduceRecord(
        'partitions',
        {ID: '2', STA: 'D', STAT: stat},
        log.logger
      );

      expect(result).toEqual({
        state: 4,
        attributes: {ID: '2', STA: 'D', STAT: stat, total_consumption: 4},
      });
    });

    it('falls back to STA when there is no consumption', () => {
      const result = reduceRecord(
        'partitions',
        {ID: '2', STA: 'DISARMED', STAT: []},
        log.logger
      );

      expect(result.state).toBe('DISARMED');
      expect(result.attributes.total_consumption).toBe(0);
    });

    it('reports zero without STAT or VAL', () => {
      expect(
        reduceRecord('partitions', {ID: '2'}, log.logger).attributes
          .total_consumption
      ).toBe(0);
      expect(
        reduceRecord('partitions', {ID: '2', STAT: [{}]}, log.logger)
          .attributes.total_consumption
      ).toBe(0);
    });

    it('skips malformed and missing ENC readings', () => {
      const result = reduceRecord(
        'partitions',
        {ID: '2', STAT: [{VAL: [{ENC: 'x'}, {}, {ENC: 3}, 'junk']}]},
        log.logger
      );

      expect(result.state).toBe(3);
      expect(log.error).toHaveBeenCalledWith(
        'Error converting ENC: invalid number "x"'
      );
    });
  });

  it('treats an overflowing total as no consumption', () => {
    const result = reduceRecord(
      'partitions',
      {ID: '2', STA: 'D', STAT: [{VAL: [{ENC: '1e308'}, {ENC: '1e308'}]}]},
      log.logger
    );

    expect(result.state).toBe('D');
    expect(result.attributes.total_consumption).toBe(0);
  });

  it('does not share nested data with the record', () => {
    const stat = [{VAL: [{ENC: '1'}]}];
    const result = reduceRecord(
      'partitions',
      {ID: '2', STAT: stat},
      log.logger
    );

    expect(result.attributes.STAT).toEqual(stat);
    expect(result.attributes.STAT).not.toBe(stat);
  });

  describe('zones and other categories', () => {
    it('copies the record and uses STA as state', () => {
      const record = {ID: '7', STA: 'IDLE', BYP: 'NO'};
      const result = reduceRecord('zones', record, log.logger);

      expect(result).toEqual({state: 'IDLE', attributes: record});
      expect(result.attributes).not.toBe(record);
    });

    it('treats unrecognised categories the same way', () => {
      const result = reduceRecord('outputs', {ID: '3'}, log.logger);

      expect(result).toEqual({state: 'unknown', attributes: {ID: '3'}});
    });
  });
});
