import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './common/config/configuration';
import { AppController } from './app.controller';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { StorageModule } from './providers/storage/storage.module';
import { OpenAIModule } from './providers/openai/openai.module';

// Business Modules
import { JobsModule } from './modules/jobs/jobs.module';
import { MediaModule } from './modules/media/media.module';
import { TranscriptsModule } from './modules/transcripts/transcripts.module';
import { FramesModule } from './modules/frames/frames.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),

    SupabaseModule,
    StorageModule,
    OpenAIModule,

    JobsModule,
    MediaModule,
    TranscriptsModule,
    FramesModule,
    IngestionModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
