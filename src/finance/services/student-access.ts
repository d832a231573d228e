import { ForbiddenException } from '@nestjs/common';
import { ActorContext } from '../../common/decorators/school.decorator';
import { Role } from '../../user/enums/role.enum';
import { Student } from '../../student/entities/student.entity';

/** Students act only for themselves and parents only for their own children. */
export function assertCanActForStudent(actor: ActorContext, student: Pick<Student, 'userId' | 'parentUserId'>): void {
  if (actor.role === Role.STUDENT && student.userId !== actor.userId) {
    throw new ForbiddenException('Students may only act on their own fees');
  }
  if (actor.role === Role.PARENT && student.parentUserId !== actor.userId) {
    throw new ForbiddenException('Parents may only act on fees of their own children');
  }
}
