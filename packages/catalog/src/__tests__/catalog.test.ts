import { describe, it, expect } from 'vitest';
import { channelFromPrefix, getChannelLabel, isChannel } from '../channels';
import { fromMinorUnits, isMetricKey, toMinorUnits } from '../metrics';
import { isReportKind, isSourceReportType, sourceKey } from '../types';

describe('channels', () => {
  it('should resolve filename prefixes in any case', () => {
    expect(channelFromPrefix('TikTok')).toBe('tiktok');
    expect(channelFromPrefix(' FLEXPORT ')).toBe('flexport');
    expect(channelFromPrefix('Ebay')).toBeNull();
  });

  it('should label channels and pass unknown values through', () => {
    expect(getChannelLabel('tiktok')).toBe('TikTok');
    expect(getChannelLabel('other')).toBe('other');
    expect(isChannel('shopify')).toBe(true);
  });
});

describe('metrics', () => {
  it('should convert revenue to cents and counts as-is', () => {
    expect(toMinorUnits('revenue', 19.99)).toBe(1999);
    expect(toMinorUnits('units', 4)).toBe(4);
    expect(fromMinorUnits('revenue', 2029)).toBe(20.29);
    expect(isMetricKey('onHand')).toBe(true);
    expect(isMetricKey('on_hand')).toBe(false);
  });
});

describe('types', () => {
  it('should build source keys and check report names', () => {
    expect(sourceKey('amazon', 'awd')).toBe('amazon:awd');
    expect(isReportKind('inventory')).toBe(true);
    expect(isSourceReportType('returns')).toBe(false);
  });
});
