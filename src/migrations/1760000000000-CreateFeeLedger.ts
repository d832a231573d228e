import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateFeeLedger1760000000000 implements MigrationInterface {
  name = 'CreateFeeLedger1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE "schools" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" varchar NOT NULL UNIQUE,
        "code" varchar NOT NULL UNIQUE,
        "status" varchar NOT NULL DEFAULT 'ACTIVE',
        "phone" varchar(20),
        "email" varchar(255),
        "address" text,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_schools" PRIMARY KEY ("id")
      )`);

    await queryRunner.query(
      `CREATE TYPE "users_role_enum" AS ENUM ('SUPER_ADMIN', 'ADMIN', 'FINANCE', 'TEACHER', 'STUDENT', 'PARENT')`,
    );
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "username" varchar NOT NULL UNIQUE,
        "email" varchar(255) UNIQUE,
        "role" "users_role_enum" NOT NULL DEFAULT 'STUDENT',
        "phone" varchar(20),
        "schoolId" uuid REFERENCES "schools"("id") ON DELETE SET NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )`);

    await queryRunner.query(`
      CREATE TABLE "classes" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" varchar(100) NOT NULL,
        "section" varchar(20) NOT NULL DEFAULT '',
        "schoolId" uuid NOT NULL REFERENCES "schools"("id") ON DELETE CASCADE,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_classes" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_class_name_section_school" UNIQUE ("schoolId", "name", "section")
      )`);

    await queryRunner.query(`CREATE TYPE "students_status_enum" AS ENUM ('active', 'inactive', 'graduated')`);
    await queryRunner.query(`
      CREATE TABLE "students" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "admissionNo" varchar(50) NOT NULL,
        "firstName" varchar NOT NULL,
        "lastName" varchar NOT NULL,
        "status" "students_status_enum" NOT NULL DEFAULT 'active',
        "guardianName" varchar(150),
        "guardianPhone" varchar(20),
        "guardianEmail" varchar(255),
        "whatsappOptIn" boolean NOT NULL DEFAULT false,
        "userId" uuid,
        "parentUserId" uuid,
        "classId" uuid NOT NULL REFERENCES "classes"("id"),
        "schoolId" uuid NOT NULL REFERENCES "schools"("id") ON DELETE CASCADE,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_students" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_student_admission_school" UNIQUE ("schoolId", "admissionNo")
      )`);
    await queryRunner.query(`CREATE INDEX "IDX_students_classId" ON "students" ("classId")`);
    await queryRunner.query(`CREATE INDEX "IDX_students_schoolId" ON "students" ("schoolId")`);

    await queryRunner.query(`
      CREATE TABLE "fee_structures" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "academicYear" varchar(20) NOT NULL,
        "tuitionFee" numeric(12,2) NOT NULL DEFAULT 0,
        "admissionFee" numeric(12,2) NOT NULL DEFAULT 0,
        "developmentFee" numeric(12,2) NOT NULL DEFAULT 0,
        "transportFee" numeric(12,2) NOT NULL DEFAULT 0,
        "libraryFee" numeric(12,2) NOT NULL DEFAULT 0,
        "labFee" numeric(12,2) NOT NULL DEFAULT 0,
        "sportsFee" numeric(12,2) NOT NULL DEFAULT 0,
        "otherFee" numeric(12,2) NOT NULL DEFAULT 0,
        "totalFee" numeric(12,2) NOT NULL,
        "installments" integer NOT NULL DEFAULT 1,
        "dueDates" jsonb NOT NULL DEFAULT '[]',
        "isActive" boolean NOT NULL DEFAULT true,
        "classId" uuid NOT NULL REFERENCES "classes"("id") ON DELETE CASCADE,
        "schoolId" uuid NOT NULL REFERENCES "schools"("id") ON DELETE CASCADE,
        "createdById" uuid,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_fee_structures" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_fee_structure_school_class_year" UNIQUE ("schoolId", "classId", "academicYear")
      )`);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_fee_structure_active_class" ON "fee_structures" ("schoolId", "classId") WHERE "isActive" = true`,
    );

    await queryRunner.query(`CREATE TYPE "payments_paymentmode_enum" AS ENUM ('cash', 'cheque', 'bank_transfer', 'online')`);
    await queryRunner.query(`CREATE TYPE "payments_status_enum" AS ENUM ('pending', 'completed', 'refunded')`);
    await queryRunner.query(`
      CREATE TABLE "payments" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "receiptNumber" varchar(50) NOT NULL,
        "amount" numeric(12,2) NOT NULL CHECK ("amount" > 0),
        "paymentDate" date NOT NULL,
        "paymentMode" "payments_paymentmode_enum" NOT NULL,
        "status" "payments_status_enum" NOT NULL DEFAULT 'completed',
        "transactionId" varchar(100),
        "chequeNo" varchar(50),
        "bankName" varchar(100),
        "remarks" text,
        "refundedAmount" numeric(12,2) NOT NULL DEFAULT 0 CHECK ("refundedAmount" >= 0 AND "refundedAmount" <= "amount"),
        "refundReference" varchar(100),
        "studentId" uuid NOT NULL REFERENCES "students"("id"),
        "feeStructureId" uuid NOT NULL REFERENCES "fee_structures"("id") ON DELETE RESTRICT,
        "schoolId" uuid NOT NULL REFERENCES "schools"("id") ON DELETE CASCADE,
        "collectedById" uuid,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_payments" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_payments_school_receipt" ON "payments" ("schoolId", "receiptNumber")`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_payments_school_transaction" ON "payments" ("schoolId", "transactionId") WHERE "transactionId" IS NOT NULL`,
    );
    await queryRunner.query(
      `CREATE INDEX "idx_payments_student_structure" ON "payments" ("studentId", "feeStructureId")`,
    );

    await queryRunner.query(`CREATE TYPE "payment_history_action_enum" AS ENUM ('created', 'refunded')`);
    await queryRunner.query(`
      CREATE TABLE "payment_history" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "paymentId" uuid NOT NULL REFERENCES "payments"("id") ON DELETE CASCADE,
        "action" "payment_history_action_enum" NOT NULL,
        "oldStatus" "payments_status_enum",
        "newStatus" "payments_status_enum" NOT NULL,
        "amountChanged" numeric(12,2) NOT NULL,
        "remarks" text,
        "changedById" uuid,
        "changedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_payment_history" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(`CREATE INDEX "IDX_payment_history_paymentId" ON "payment_history" ("paymentId")`);

    await queryRunner.query(`
      CREATE TABLE "student_fee_status" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "studentId" uuid NOT NULL REFERENCES "students"("id") ON DELETE CASCADE,
        "feeStructureId" uuid NOT NULL REFERENCES "fee_structures"("id") ON DELETE CASCADE,
        "schoolId" uuid NOT NULL,
        "totalFee" numeric(12,2) NOT NULL,
        "paidAmount" numeric(12,2) NOT NULL DEFAULT 0 CHECK ("paidAmount" >= 0),
        "remainingAmount" numeric(12,2) NOT NULL,
        "paymentPercentage" numeric(5,2) NOT NULL DEFAULT 0,
        "isFullyPaid" boolean NOT NULL DEFAULT false,
        "isOverdue" boolean NOT NULL DEFAULT false,
        "nextDueDate" date,
        "lastPaymentDate" date,
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_student_fee_status" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_student_fee_status_student_structure" UNIQUE ("studentId", "feeStructureId")
      )`);
    await queryRunner.query(
      `CREATE INDEX "idx_student_fee_status_school_overdue" ON "student_fee_status" ("schoolId", "isOverdue")`,
    );

    await queryRunner.query(`
      CREATE TABLE "receipt_sequences" (
        "schoolId" uuid NOT NULL,
        "day" varchar(8) NOT NULL,
        "lastValue" integer NOT NULL DEFAULT 0,
        CONSTRAINT "PK_receipt_sequences" PRIMARY KEY ("schoolId", "day")
      )`);

    await queryRunner.query(`CREATE TYPE "gateway_orders_status_enum" AS ENUM ('created', 'paid', 'failed')`);
    await queryRunner.query(`
      CREATE TABLE "gateway_orders" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "gateway" varchar(20) NOT NULL,
        "gatewayOrderId" varchar(100) NOT NULL,
        "receipt" varchar(60) NOT NULL,
        "amount" numeric(12,2) NOT NULL,
        "currency" varchar(3) NOT NULL,
        "status" "gateway_orders_status_enum" NOT NULL DEFAULT 'created',
        "paymentId" varchar(100),
        "studentId" uuid NOT NULL,
        "feeStructureId" uuid NOT NULL,
        "schoolId" uuid NOT NULL,
        "createdById" uuid,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_gateway_orders" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_gateway_orders_gatewayOrderId" ON "gateway_orders" ("gatewayOrderId")`,
    );
    await queryRunner.query(
      `CREATE INDEX "idx_gateway_orders_school_student" ON "gateway_orders" ("schoolId", "studentId")`,
    );

    await queryRunner.query(
      `CREATE TYPE "notifications_type_enum" AS ENUM ('fee_reminder', 'payment', 'refund', 'system', 'alert')`,
    );
    await queryRunner.query(`CREATE TYPE "notifications_priority_enum" AS ENUM ('low', 'medium', 'high')`);
    await queryRunner.query(`
      CREATE TABLE "notifications" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "title" varchar NOT NULL,
        "message" text,
        "type" "notifications_type_enum" NOT NULL DEFAULT 'system',
        "priority" "notifications_priority_enum" NOT NULL DEFAULT 'medium',
        "read" boolean NOT NULL DEFAULT false,
        "metadata" jsonb,
        "schoolId" uuid REFERENCES "schools"("id"),
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        "readAt" TIMESTAMP,
        CONSTRAINT "PK_notifications" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(`CREATE INDEX "IDX_notifications_schoolId" ON "notifications" ("schoolId")`);

    await queryRunner.query(`CREATE TYPE "logs_level_enum" AS ENUM ('info', 'warn', 'error', 'debug')`);
    await queryRunner.query(`
      CREATE TABLE "logs" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "action" varchar NOT NULL,
        "module" varchar(50) NOT NULL,
        "level" "logs_level_enum" NOT NULL DEFAULT 'info',
        "performedBy" json,
        "entityId" varchar,
        "entityType" varchar,
        "oldValues" json,
        "newValues" json,
        "metadata" json,
        "schoolId" uuid,
        "timestamp" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_logs" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(`CREATE INDEX "IDX_logs_schoolId" ON "logs" ("schoolId")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const table of [
      'logs',
      'notifications',
      'gateway_orders',
      'receipt_sequences',
      'student_fee_status',
      'payment_history',
      'payments',
      'fee_structures',
      'students',
      'classes',
      'users',
      'schools',
    ]) {
      await queryRunner.query(`DROP TABLE IF EXISTS "${table}"`);
    }
    for (const type of [
      'logs_level_enum',
      'notifications_priority_enum',
      'notifications_type_enum',
      'gateway_orders_status_enum',
      'payment_history_action_enum',
      'payments_status_enum',
      'payments_paymentmode_enum',
      'students_status_enum',
      'users_role_enum',
    ]) {
      await queryRunner.query(`DROP TYPE IF EXISTS "${type}"`);
    }
  }
}
