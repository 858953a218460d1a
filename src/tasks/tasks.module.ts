import { Module } from '@nestjs/common';
import { ShoppingCartsModule } from '../shopping-carts/shopping-carts.module';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';

@Module({
  imports: [ShoppingCartsModule],
  providers: [TasksService],
  controllers: [TasksController],
})
export class TasksModule {}
