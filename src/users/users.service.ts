import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { User } from './entities/user.entity';

@Injectable()
export class UsersService {
    constructor(
        @InjectRepository(User)
        private userRepository: Repository<User>,
    ) { }

    async findById(id: number, manager?: EntityManager): Promise<User> {
        const repository = manager ? manager.getRepository(User) : this.userRepository;
        const user = await repository.findOneBy({ id });
        if (!user) {
            throw new NotFoundException(`User ${id} not found`);
        }
        return user;
    }

    async findByIds(ids: number[]): Promise<Map<number, User>> {
        if (ids.length === 0) return new Map();
        const users = await this.userRepository.findBy({ id: In([...new Set(ids)]) });
        return new Map(users.map((user) => [user.id, user]));
    }
}
