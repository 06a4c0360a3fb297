import { MockFaceDetectorService, mockFaceBox } from '../../src/services/mock/face-detector.service.js';
import { euclideanDistance } from '../../src/services/matcher.service.js';
import { DetectionFailureError } from '../../src/services/errors.js';
import { BLACK, GREY, WHITE, solidImage } from '../helpers/fixtures.js';

describe('MockFaceDetectorService', () => {
    const detector = new MockFaceDetectorService();

    it('places the face in the centre, half the shorter side wide', () => {
        expect(mockFaceBox(200, 100)).toEqual({ top: 25, right: 125, bottom: 75, left: 75 });
        expect(mockFaceBox(64, 64)).toEqual({ top: 16, right: 48, bottom: 48, left: 16 });
    });

    it('finds exactly one face with a 64-value embedding', async () => {
        const faces = await detector.detect(await solidImage(100, 100, GREY));

        expect(faces).toHaveLength(1);
        expect(faces[0].box).toEqual({ top: 25, right: 75, bottom: 75, left: 25 });
        expect(faces[0].embedding).toHaveLength(64);
        for (const value of faces[0].embedding) {
            expect(value).toBeCloseTo(128 / 255, 1);
        }
    });

    it('handles images with an alpha channel', async () => {
        const faces = await detector.detect(await solidImage(100, 100, WHITE, 4));

        expect(faces[0].embedding).toHaveLength(64);
        for (const value of faces[0].embedding) {
            expect(value).toBeCloseTo(1, 1);
        }
    });

    it('is deterministic for the same image', async () => {
        const image = await solidImage(120, 80, GREY);

        const [first] = await detector.detect(image);
        const [second] = await detector.detect(image);

        expect(euclideanDistance(first.embedding, second.embedding)).toBe(0);
    });

    it('places different images far apart', async () => {
        const [black] = await detector.detect(await solidImage(100, 100, BLACK));
        const [white] = await detector.detect(await solidImage(100, 100, WHITE));

        expect(euclideanDistance(black.embedding, white.embedding)).toBeGreaterThan(7.5);
    });

    it('finds no face in a tiny image', async () => {
        expect(await detector.detect(await solidImage(20, 100, GREY))).toEqual([]);
    });

    it('fails on bytes that are not an image', async () => {
        await expect(detector.detect(Buffer.from('not an image'))).rejects.toBeInstanceOf(DetectionFailureError);
    });

    it('names its provider', () => {
        expect(detector.getProviderName()).toBe('mock');
    });
});
