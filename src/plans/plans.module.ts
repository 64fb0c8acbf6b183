import { Global, Module } from '@nestjs/common';
import { FirestoreModule } from '../firestore/firestore.module.js';
import { PlansRepository } from './plans.repository.js';

@Global()
@Module({
  imports: [FirestoreModule],
  providers: [PlansRepository],
  exports: [PlansRepository],
})
export class PlansModule {}
