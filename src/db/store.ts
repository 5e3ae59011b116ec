/**
 * Durable store seen by the orchestrator: job/index mirror (Supabase) plus
 * artifact upload (Cloudinary). Either half may be unconfigured; when both
 * are, there is no store and the orchestrator runs on local files alone.
 */
import { isSupabaseConfigured } from './client.js';
import {
  getRemoteIndex,
  getRemoteJob,
  putRemoteIndex,
  putRemoteJob,
  type Job,
  type ProjectIndex,
} from './jobs.js';
import { isCloudinaryConfigured, uploadRenderedVideo } from '../platforms/cloudinary.js';

export interface DurableStore {
  putJob(job: Job): Promise<void>;
  getJob(id: string): Promise<Job | null>;
  putIndex(index: ProjectIndex): Promise<void>;
  getIndex(): Promise<ProjectIndex>;
  /** Public URL of the uploaded artifact, or null when upload is unavailable. */
  uploadArtifact(filePath: string, projectKey: string): Promise<string | null>;
}

export function createDurableStore(): DurableStore | null {
  const mirror = isSupabaseConfigured();
  const uploads = isCloudinaryConfigured();
  if (!mirror && !uploads) return null;

  return {
    putJob:   (job) => (mirror ? putRemoteJob(job) : Promise.resolve()),
    getJob:   (id) => (mirror ? getRemoteJob(id) : Promise.resolve(null)),
    putIndex: (index) => (mirror ? putRemoteIndex(index) : Promise.resolve()),
    getIndex: () => (mirror ? getRemoteIndex() : Promise.resolve({})),
    uploadArtifact: (filePath, projectKey) =>
      uploads ? uploadRenderedVideo(filePath, `${projectKey}_final`) : Promise.resolve(null),
  };
}
