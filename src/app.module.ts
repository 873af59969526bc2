import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { FirestoreModule } from './firestore/firestore.module';
import { StorageModule } from './storage/storage.module';
import { ArxivModule } from './arxiv/arxiv.module';
import { FigureExtractionModule } from './figure-extraction/figure-extraction.module';
import { FigureResolverModule } from './figure-resolver/figure-resolver.module';
import { PaperModule } from './paper/paper.module';
import { DebugModule } from './debug/debug.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    FirestoreModule,
    StorageModule,
    ArxivModule,
    FigureExtractionModule,
    FigureResolverModule,
    PaperModule,
    DebugModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
