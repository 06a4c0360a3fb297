import {
    formatTimestampKey,
    generateRecognitionId,
    generateTimestampKey,
    generateUnknownFaceId,
} from '../../src/utils/ids.js';

describe('timestamp keys', () => {
    it('formats local time with microseconds', () => {
        const millis = new Date(2024, 0, 2, 3, 4, 5, 678).getTime();

        expect(formatTimestampKey(millis * 1000 + 901)).toBe('20240102_030405_678901');
    });

    it('never repeats and sorts in creation order', () => {
        const keys = Array.from({ length: 200 }, () => generateTimestampKey());

        expect(new Set(keys).size).toBe(keys.length);
        expect([...keys].sort()).toEqual(keys);
    });

    it('keeps increasing when the clock does not move', () => {
        const frozen = () => new Date(2030, 5, 1, 12, 0, 0, 0).getTime();

        const first = generateTimestampKey(frozen);
        const second = generateTimestampKey(frozen);

        expect(second > first).toBe(true);
    });

    it('prefixes record ids', () => {
        expect(generateUnknownFaceId()).toMatch(/^unknown_\d{8}_\d{6}_\d{6}$/);
        expect(generateRecognitionId()).toMatch(/^recognition_\d{8}_\d{6}_\d{6}$/);
    });
});
