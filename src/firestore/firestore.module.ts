import { Module } from '@nestjs/common';
import { FirestoreService } from './firestore.service.js';

/** Imported by the data-access modules only; handlers go through PlansRepository. */
@Module({
  providers: [FirestoreService],
  exports: [FirestoreService],
})
export class FirestoreModule {}
