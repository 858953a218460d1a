import { Controller, HttpCode, HttpStatus, Logger, Post, UseGuards } from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { TasksService } from './tasks.service';

@Controller('tasks')
@UseGuards(SupabaseAuthGuard)
export class TasksController {
  private readonly logger = new Logger(TasksController.name);

  constructor(private readonly tasksService: TasksService) {}

  /** Runs the abandoned cart cleanup now instead of waiting for the nightly job. */
  @Post('abandoned-carts')
  @HttpCode(HttpStatus.OK)
  async removeAbandonedCarts(): Promise<{ removed: number }> {
    this.logger.log('Manual abandoned cart cleanup requested');
    return { removed: await this.tasksService.removeAbandonedCarts() };
  }
}
