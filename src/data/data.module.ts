import { Module } from '@nestjs/common';
import { FirestoreModule } from '../firestore/firestore.module';
import { PaperFigureRepository } from './repositories/paper-figure.repository';

@Module({
  imports: [FirestoreModule],
  providers: [PaperFigureRepository],
  exports: [PaperFigureRepository],
})
export class DataModule {}
