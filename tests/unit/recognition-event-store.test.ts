import fs from 'fs/promises';
import path from 'path';
import { LocalRecognitionEventStore } from '../../src/services/local/recognition-event-store.service.js';
import { StorageWriteError } from '../../src/services/errors.js';
import { FaceCapture } from '../../src/types/face.js';
import { makeTempDir, removeTempDir } from '../helpers/fixtures.js';

describe('LocalRecognitionEventStore', () => {
    let baseDir: string;
    let store: LocalRecognitionEventStore;
    const original = Buffer.from('original-image');

    const captures: FaceCapture[] = [
        {
            faceIndex: 0,
            box: { top: 10.4, right: 60.6, bottom: 60, left: 10 },
            matched: true,
            name: 'Alice',
            distance: 0.3,
            crop: Buffer.from('crop-0'),
        },
        {
            faceIndex: 1,
            box: { top: 20, right: 150, bottom: 70, left: 100 },
            matched: false,
            name: '',
            distance: null,
            crop: Buffer.from('crop-1'),
        },
    ];

    beforeEach(async () => {
        baseDir = await makeTempDir();
        store = new LocalRecognitionEventStore(baseDir);
    });

    afterEach(async () => {
        await removeTempDir(baseDir);
    });

    it('stores an event with every face', async () => {
        const eventId = await store.create(original, captures);

        expect(eventId).toMatch(/^recognition_\d{8}_\d{6}_\d{6}$/);
        expect(await store.get(eventId)).toEqual({
            eventId,
            timestamp: expect.any(String),
            totalFaces: 2,
            faces: [
                {
                    faceIndex: 0,
                    matched: true,
                    name: 'Alice',
                    distance: 0.3,
                    box: { top: 10, right: 61, bottom: 60, left: 10 },
                    faceImage: 'face_0.jpg',
                },
                {
                    faceIndex: 1,
                    matched: false,
                    name: '',
                    distance: null,
                    box: { top: 20, right: 150, bottom: 70, left: 100 },
                    faceImage: 'face_1.jpg',
                },
            ],
        });
    });

    it('writes snake_case metadata', async () => {
        const eventId = await store.create(original, captures.slice(0, 1));

        const metadata = JSON.parse(
            await fs.readFile(path.join(baseDir, 'recognitions', eventId, 'metadata.json'), 'utf8')
        );
        expect(metadata.event_id).toBe(eventId);
        expect(metadata.total_faces).toBe(1);
        expect(metadata.faces[0]).toEqual({
            face_index: 0,
            known_person: true,
            name_person: 'Alice',
            distance: 0.3,
            location: { top: 10, right: 61, bottom: 60, left: 10 },
            face_image: 'face_0.jpg',
        });
    });

    it('stores an event without faces', async () => {
        const eventId = await store.create(original, []);

        expect(await store.get(eventId)).toMatchObject({ totalFaces: 0, faces: [] });
        expect(await store.getOriginalImage(eventId)).toEqual(original);
    });

    it('serves the original image and each crop', async () => {
        const eventId = await store.create(original, captures);

        expect(await store.getOriginalImage(eventId)).toEqual(original);
        expect(await store.getFaceImage(eventId, 1)).toEqual(Buffer.from('crop-1'));
        expect(await store.getFaceImage(eventId, 2)).toBeNull();
        expect(await store.getFaceImage(eventId, -1)).toBeNull();
        expect(await store.getFaceImage(eventId, 0.5)).toBeNull();
    });

    it('lists newest first', async () => {
        const first = await store.create(original, []);
        const second = await store.create(original, []);

        expect((await store.list()).map((event) => event.eventId)).toEqual([second, first]);
    });

    it('deletes an event once', async () => {
        const eventId = await store.create(original, captures);

        expect(await store.delete(eventId)).toBe(true);
        expect(await store.get(eventId)).toBeNull();
        expect(await store.getOriginalImage(eventId)).toBeNull();
        expect(await store.delete(eventId)).toBe(false);
    });

    it('returns null for missing or unsafe ids', async () => {
        expect(await store.get('recognition_missing')).toBeNull();
        expect(await store.get('../settings.json')).toBeNull();
    });

    it('surfaces write failures', async () => {
        await fs.writeFile(path.join(baseDir, 'recognitions'), 'not a directory');

        await expect(store.create(original, captures)).rejects.toBeInstanceOf(StorageWriteError);
    });
});
