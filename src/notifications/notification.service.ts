import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Notification, NotificationType, NotificationPriority } from './entities/notification.entity';

export interface CreateNotificationDto {
  title: string;
  message?: string;
  type?: NotificationType;
  priority?: NotificationPriority;
  schoolId?: string;
  metadata?: Record<string, unknown>;
}

export interface NotificationPage {
  notifications: Notification[];
  total: number;
}

/** School-level notification feed shown to administrators. */
@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @InjectRepository(Notification)
    private notificationRepository: Repository<Notification>,
  ) {}

  async create(createNotificationDto: CreateNotificationDto): Promise<Notification> {
    const notification = this.notificationRepository.create(createNotificationDto);
    const savedNotification = await this.notificationRepository.save(notification);
    this.logger.debug(`Notification ${savedNotification.id} saved: ${savedNotification.title}`);
    return savedNotification;
  }

  async findAll(schoolId: string, page: number = 1, limit: number = 10, unreadOnly = false): Promise<NotificationPage> {
    const where: FindOptionsWhere<Notification> = unreadOnly ? { schoolId, read: false } : { schoolId };
    const [notifications, total] = await this.notificationRepository.findAndCount({
      where,
      order: { createdAt: 'DESC' },
      skip: (page - 1) * limit,
      take: limit,
    });

    return { notifications, total };
  }

  async markAsRead(schoolId: string, id: string): Promise<Notification> {
    const notification = await this.notificationRepository.findOne({ where: { id, schoolId } });
    if (!notification) {
      throw new NotFoundException('Notification not found');
    }

    notification.read = true;
    notification.readAt = new Date();
    return this.notificationRepository.save(notification);
  }

  async getUnreadCount(schoolId: string): Promise<number> {
    return this.notificationRepository.count({ where: { schoolId, read: false } });
  }
}
