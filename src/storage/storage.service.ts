import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as admin from 'firebase-admin';
import { debugLog } from '../common/debug-logger';
import { errorMessage, PersistenceError } from '../common/errors';
import { parseServiceAccount } from '../common/service-account';

/**
 * Remote object store for figure images. Disabled (every call a no-op) when
 * FIREBASE_STORAGE_BUCKET is not configured.
 */
@Injectable()
export class FirebaseStorageService {
  private readonly logger = new Logger(FirebaseStorageService.name);
  private readonly bucketName: string;
  private storage: admin.storage.Storage | null = null;

  constructor(private readonly configService: ConfigService) {
    this.bucketName = this.configService.get<string>('FIREBASE_STORAGE_BUCKET', '').trim();

    if (this.bucketName) {
      this.logger.log(`Firebase Storage configured for bucket: ${this.bucketName}`);
    } else {
      this.logger.warn('FIREBASE_STORAGE_BUCKET not set; figures stay local only');
    }
  }

  isEnabled(): boolean {
    return this.bucketName.length > 0;
  }

  publicUrl(key: string): string {
    return `https://storage.googleapis.com/${this.bucketName}/${key}`;
  }

  /**
   * Uploads bytes under key and makes the object public. Returns the public
   * URL, or null when storage is disabled or the upload failed. Repeating an
   * upload with the same key and bytes is harmless.
   */
  async putObject(key: string, bytes: Buffer, contentType: string = this.getContentType(key)): Promise<string | null> {
    if (!this.isEnabled()) {
      return null;
    }

    try {
      const file = this.getStorage().bucket(this.bucketName).file(key);

      await new Promise<void>((resolve, reject) => {
        const stream = file.createWriteStream({
          resumable: false,
          metadata: { contentType },
        });
        stream.on('error', reject);
        stream.on('finish', () => resolve());
        stream.end(bytes);
      });

      try {
        await file.makePublic();
      } catch (publicError) {
        // Uniform bucket-level access rejects per-object ACLs; the URL still works there
        this.logger.warn(`Could not make ${key} public: ${errorMessage(publicError)}`);
      }

      debugLog(`Uploaded ${key} (${bytes.length} bytes)`);
      return this.publicUrl(key);
    } catch (error) {
      this.logger.error(`Failed to upload ${key}: ${errorMessage(error)}`);
      return null;
    }
  }

  async deleteFolderContents(folderPath: string): Promise<number> {
    if (!this.isEnabled()) {
      return 0;
    }

    const prefix = folderPath.endsWith('/') ? folderPath : `${folderPath}/`;
    try {
      const [files] = await this.getStorage().bucket(this.bucketName).getFiles({ prefix });
      await Promise.all(files.map((file) => file.delete()));
      this.logger.log(`Deleted ${files.length} files from folder: ${prefix}`);
      return files.length;
    } catch (error) {
      throw new PersistenceError(`Failed to delete folder contents ${prefix}`, { cause: error });
    }
  }

  getContentType(filePath: string): string {
    const extension = filePath.split('.').pop()?.toLowerCase();

    switch (extension) {
      case 'png':
        return 'image/png';
      case 'jpg':
      case 'jpeg':
        return 'image/jpeg';
      case 'gif':
        return 'image/gif';
      case 'webp':
        return 'image/webp';
      case 'svg':
        return 'image/svg+xml';
      case 'json':
        return 'application/json';
      case 'md':
        return 'text/markdown';
      default:
        return 'application/octet-stream';
    }
  }

  private getStorage(): admin.storage.Storage {
    if (!this.storage) {
      if (!admin.apps.length) {
        const serviceAccount = parseServiceAccount(this.configService.get<string>('FIREBASE_SERVICE_ACCOUNT'));
        admin.initializeApp({
          credential: serviceAccount
            ? admin.credential.cert({
                projectId: serviceAccount.project_id,
                clientEmail: serviceAccount.client_email,
                privateKey: serviceAccount.private_key,
              })
            : admin.credential.applicationDefault(),
          storageBucket: this.bucketName,
        });
        debugLog('Firebase Admin initialized for storage');
      }
      this.storage = admin.storage();
    }
    return this.storage;
  }
}
