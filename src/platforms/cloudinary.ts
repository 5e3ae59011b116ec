/**
 * Cloudinary video upload for finished renders.
 * Returns null when Cloudinary is unconfigured or the upload fails, in which
 * case callers fall back to a locally served URL.
 */
import * as fs from 'fs';
import { v2 as cloudinary } from 'cloudinary';
import { env, FEATURES } from '../config.js';
import { logger } from '../utils/logger.js';

let configured = false;

function ensureConfigured(): boolean {
  if (!FEATURES.cloudinary) return false;
  if (!configured) {
    cloudinary.config({
      cloud_name: env.CLOUDINARY_CLOUD_NAME,
      api_key:    env.CLOUDINARY_API_KEY,
      api_secret: env.CLOUDINARY_API_SECRET,
      secure:     true,
    });
    configured = true;
  }
  return true;
}

export const isCloudinaryConfigured = (): boolean => FEATURES.cloudinary;

export async function uploadRenderedVideo(localPath: string, publicId: string): Promise<string | null> {
  if (!ensureConfigured() || !fs.existsSync(localPath)) return null;
  try {
    const result = await cloudinary.uploader.upload(localPath, {
      resource_type: 'video',
      public_id:     publicId,
      folder:        env.CLOUDINARY_FOLDER,
      overwrite:     true,
    });
    logger.info('Cloudinary: upload complete', { publicId, url: result.secure_url });
    return result.secure_url;
  } catch (err) {
    logger.error('Cloudinary: upload failed', { publicId, err });
    return null;
  }
}
