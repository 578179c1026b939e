import { describe, expect, it } from 'vitest';
import { formatBytes, formatDuration, formatPercent } from './formatters';

describe('formatBytes', () => {
	it('formats zero and invalid values as 0 B', () => {
		expect(formatBytes(0)).toBe('0 B');
		expect(formatBytes(-5)).toBe('0 B');
		expect(formatBytes(Number.NaN)).toBe('0 B');
	});

	it('uses base 1024 units', () => {
		expect(formatBytes(512)).toBe('512 B');
		expect(formatBytes(1024)).toBe('1.0 KB');
		expect(formatBytes(1536)).toBe('1.5 KB');
		expect(formatBytes(1024 * 1024)).toBe('1.0 MB');
		expect(formatBytes(3 * 1024 ** 3)).toBe('3.0 GB');
	});

	it('caps at terabytes', () => {
		expect(formatBytes(2048 * 1024 ** 4)).toBe('2048.0 TB');
	});
});

describe('formatDuration', () => {
	it('shows milliseconds below one second', () => {
		expect(formatDuration(250)).toBe('250ms');
	});

	it('shows seconds with one decimal', () => {
		expect(formatDuration(1400)).toBe('1.4s');
	});
});

describe('formatPercent', () => {
	it('handles tiny and empty values', () => {
		expect(formatPercent(0)).toBe('0%');
		expect(formatPercent(0.05)).toBe('<0.1%');
		expect(formatPercent(Number.POSITIVE_INFINITY)).toBe('0%');
	});

	it('rounds to one decimal', () => {
		expect(formatPercent(33.333)).toBe('33.3%');
	});
});
