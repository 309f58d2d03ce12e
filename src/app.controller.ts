import { Controller, Get } from '@nestjs/common';
import { BackgroundJobsService } from './modules/jobs/background-jobs.service';

@Controller()
export class AppController {
  constructor(private readonly jobs: BackgroundJobsService) {}

  /**
   * GET /api/healthz
   */
  @Get('healthz')
  health() {
    return { ok: true, jobs: { pending: this.jobs.pending, active: this.jobs.active } };
  }
}
