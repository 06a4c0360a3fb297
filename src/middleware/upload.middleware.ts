import multer from 'multer';
import { badRequest } from './error.middleware.js';

export const MAX_IMAGE_SIZE_MB = 20;

// Configure multer for memory storage
export const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: MAX_IMAGE_SIZE_MB * 1024 * 1024,
    },
    fileFilter: (req, file, cb) => {
        if (file.mimetype.startsWith('image/')) {
            cb(null, true);
        } else {
            cb(badRequest('Only image files are allowed'));
        }
    },
});

/** Single image upload under the `image` form field */
export const uploadImage = upload.single('image');
