import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { ENTITIES } from './entities';

const configService = new ConfigService();

export default new DataSource({
  type: 'postgres',
  host: configService.get('DB_HOST'),
  port: configService.getNumber('DB_PORT', 5432),
  username: configService.get('DB_USERNAME'),
  password: configService.get('DB_PASSWORD'),
  database: configService.get('DB_DATABASE'),
  entities: ENTITIES,
  migrations: ['dist/migrations/*.js'],
  synchronize: false,
  logging: configService.getOptional('NODE_ENV') === 'development',
});
