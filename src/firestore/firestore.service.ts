/**
 * Firestore access through the Firebase Admin SDK.
 * On Cloud Run / Functions credentials come from ADC; locally set
 * GOOGLE_APPLICATION_CREDENTIALS or point FIRESTORE_EMULATOR_HOST at the emulator.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { initializeApp, getApps, type App } from 'firebase-admin/app';
import {
  getFirestore,
  type CollectionReference,
  type Firestore,
} from 'firebase-admin/firestore';

export const COLLECTIONS = {
  userProfile: 'user_profile',
  pendingPlans: 'pending_plans',
  approvedPlans: 'approved_plans',
  userMessages: 'user_messages',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

@Injectable()
export class FirestoreService {
  private readonly logger = new Logger(FirestoreService.name);
  private readonly db: Firestore;

  constructor(private readonly config: ConfigService) {
    let app: App;
    const existing = getApps();
    if (existing.length === 0) {
      const projectId = this.config.get<string>('FIREBASE_PROJECT_ID') || undefined;
      app = initializeApp(projectId ? { projectId } : undefined);
      this.logger.log(`Firebase Admin SDK initialized (projectId: ${projectId ?? 'ADC default'})`);
    } else {
      app = existing[0];
    }
    this.db = getFirestore(app);
  }

  collection(name: CollectionName): CollectionReference {
    return this.db.collection(name);
  }

  /** Cheapest round trip the Admin SDK offers; used by the keep-alive probe. */
  async ping(): Promise<number> {
    const collections = await this.db.listCollections();
    return collections.length;
  }
}
