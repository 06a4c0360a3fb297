import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HttpFaceDetectorService } from '../../src/services/http/face-detector.service.js';
import { DetectionFailureError } from '../../src/services/errors.js';

type Reply = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

function clientReplying(reply: Reply) {
    const requests: InternalAxiosRequestConfig[] = [];
    const client = axios.create({
        adapter: async (config) => {
            requests.push(config);
            return reply(config);
        },
    });
    return { client, requests };
}

function ok(data: unknown) {
    return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
        data,
        status: 200,
        statusText: 'OK',
        headers: {},
        config,
    });
}

describe('HttpFaceDetectorService', () => {
    const image = Buffer.from('image-bytes');
    const options = { baseUrl: 'http://detector.test', timeoutMs: 1000 };

    it('posts the image as base64 and returns the faces', async () => {
        const faces = [
            { box: { top: 1, right: 20, bottom: 21, left: 2 }, embedding: [0.1, 0.2] },
            { box: { top: 5, right: 40, bottom: 45, left: 10 }, embedding: [0.3, 0.4] },
        ];
        const { client, requests } = clientReplying(ok({ faces }));
        const detector = new HttpFaceDetectorService(options, client);

        expect(await detector.detect(image)).toEqual(faces);
        expect(requests).toHaveLength(1);
        expect(requests[0].method).toBe('post');
        expect(requests[0].url).toBe('/detect');
        expect(JSON.parse(String(requests[0].data))).toEqual({ image: image.toString('base64') });
    });

    it('returns an empty list when the service finds no face', async () => {
        const { client } = clientReplying(ok({ faces: [] }));

        expect(await new HttpFaceDetectorService(options, client).detect(image)).toEqual([]);
    });

    it('turns a rejected image into a detection failure', async () => {
        const { client } = clientReplying(async (config) => {
            throw new AxiosError('Request failed with status code 422', 'ERR_BAD_REQUEST', config, undefined, {
                data: { error: 'cannot decode' },
                status: 422,
                statusText: 'Unprocessable Entity',
                headers: {},
                config,
            });
        });

        const detection = new HttpFaceDetectorService(options, client).detect(image);

        await expect(detection).rejects.toBeInstanceOf(DetectionFailureError);
        await expect(detection).rejects.toThrow('Detector rejected image (HTTP 422)');
    });

    it('turns an unreachable service into a detection failure', async () => {
        const { client } = clientReplying(async (config) => {
            throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
        });

        await expect(new HttpFaceDetectorService(options, client).detect(image)).rejects.toThrow(
            'Detector unavailable: connect ECONNREFUSED'
        );
    });

    it('rejects a malformed response', async () => {
        const { client } = clientReplying(ok({ faces: [{ box: { top: 1 }, embedding: [] }] }));

        await expect(new HttpFaceDetectorService(options, client).detect(image)).rejects.toBeInstanceOf(
            DetectionFailureError
        );
    });

    it('rejects embeddings of different lengths', async () => {
        const box = { top: 1, right: 2, bottom: 3, left: 0 };
        const { client } = clientReplying(ok({ faces: [{ box, embedding: [1, 2] }, { box, embedding: [1, 2, 3] }] }));

        await expect(new HttpFaceDetectorService(options, client).detect(image)).rejects.toThrow(
            'Detector returned embeddings of different lengths'
        );
    });
});
