import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UsersController } from './users.controller';
import { UsersService } from './services/users.service';
import { User } from '../auth/entities';
import { Role, UserProfile } from './entities';

@Module({
  imports: [TypeOrmModule.forFeature([User, UserProfile, Role])],
  controllers: [UsersController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
