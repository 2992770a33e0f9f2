import fs from 'fs/promises';
import { closeDB, connectDB } from '../src/config/db';
import UserModel from '../src/models/User';
import { getUploadDir, UploadedImage } from '../src/services/upload.service';
import { RequestContext } from '../src/types/context';

export function resetDatabase(): void {
  closeDB();
  connectDB(':memory:');
}

export async function removeUploadDir(): Promise<void> {
  await fs.rm(getUploadDir(), { recursive: true, force: true });
}

export async function listUploads(): Promise<string[]> {
  try {
    return await fs.readdir(getUploadDir());
  } catch {
    return [];
  }
}

// Usuario directo en la base de datos; el hash no se usa en estos tests
export function contextFor(username: string): RequestContext {
  const user = UserModel.create(username, 'not-a-real-hash');
  return { user: { id: user.id, username: user.username } };
}

export function image(originalName: string, content: string = 'fake image bytes'): UploadedImage {
  const buffer = Buffer.from(content);
  return { originalName, buffer, size: buffer.length };
}
