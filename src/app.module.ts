import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CredibilityModule } from './credibility/credibility.module';

@Module({
  imports: [CredibilityModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
