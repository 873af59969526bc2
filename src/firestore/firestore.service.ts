import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Firestore, Settings } from '@google-cloud/firestore';
import { parseServiceAccount } from '../common/service-account';
import { safePaperSegment } from '../common/paper-id';

@Injectable()
export class FirestoreService {
  private readonly logger = new Logger(FirestoreService.name);
  private readonly firestore: Firestore | null;

  constructor(private readonly configService: ConfigService) {
    const googleCloudProjectId = this.configService.get<string>('GOOGLE_CLOUD_PROJECT_ID');
    const firebaseProjectId = this.configService.get<string>('FIREBASE_PROJECT_ID');
    const databaseId = this.configService.get<string>('FIRESTORE_DATABASE_ID', '(default)');

    // Use FIREBASE_PROJECT_ID if GOOGLE_CLOUD_PROJECT_ID is not set
    const projectId = (googleCloudProjectId || firebaseProjectId)?.trim().replace(/\/$/, '');

    if (!projectId) {
      this.logger.warn('No GOOGLE_CLOUD_PROJECT_ID or FIREBASE_PROJECT_ID set; remote figure registry disabled');
      this.firestore = null;
      return;
    }

    const settings: Settings = { projectId };
    if (databaseId !== '(default)') {
      settings.databaseId = databaseId;
    }

    const serviceAccount = parseServiceAccount(this.configService.get<string>('FIREBASE_SERVICE_ACCOUNT'));
    if (serviceAccount) {
      settings.credentials = {
        client_email: serviceAccount.client_email,
        private_key: serviceAccount.private_key,
      };
      this.logger.log('Using service account credentials for Firestore');
    }

    this.firestore = new Firestore(settings);
    this.logger.log(
      `Firestore service initialized for project: ${projectId}${databaseId !== '(default)' ? ` with database: ${databaseId}` : ' with default database'}`,
    );
  }

  isEnabled(): boolean {
    return this.firestore !== null;
  }

  getPaperFiguresCollection(paperId: string) {
    return this.firestore?.collection('papers').doc(safePaperSegment(paperId)).collection('figures') ?? null;
  }
}
