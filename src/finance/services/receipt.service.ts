import { Injectable, Logger, UnprocessableEntityException } from '@nestjs/common';
import PDFDocument from 'pdfkit';
import { format, parseISO } from 'date-fns';
import { ActorContext } from '../../common/decorators/school.decorator';
import { subtractAmounts } from '../../common/money/money';
import { studentFullName } from '../../student/entities/student.entity';
import { Payment, PaymentMode, PaymentStatus } from '../entities/payment.entity';
import { FinanceService } from '../finance.service';

export interface RenderedReceipt {
  filename: string;
  content: Buffer;
}

const MODE_LABELS: Record<PaymentMode, string> = {
  [PaymentMode.CASH]: 'Cash',
  [PaymentMode.CHEQUE]: 'Cheque',
  [PaymentMode.BANK_TRANSFER]: 'Bank Transfer',
  [PaymentMode.ONLINE]: 'Online',
};

/** Lines printed on a receipt, top to bottom. */
export function receiptLines(payment: Payment): Array<[string, string]> {
  const lines: Array<[string, string]> = [
    ['Receipt Number:', payment.receiptNumber],
    ['Payment Date:', format(parseISO(payment.paymentDate), 'dd/MM/yyyy')],
    ['Student Name:', payment.student ? studentFullName(payment.student) : 'Unknown Student'],
    ['Admission No:', payment.student ? payment.student.admissionNo : 'N/A'],
    ['Academic Year:', payment.feeStructure ? payment.feeStructure.academicYear : 'N/A'],
    ['Payment Mode:', MODE_LABELS[payment.paymentMode]],
  ];
  if (payment.chequeNo) lines.push(['Cheque No:', payment.chequeNo]);
  if (payment.bankName) lines.push(['Bank:', payment.bankName]);
  if (payment.transactionId) lines.push(['Transaction ID:', payment.transactionId]);
  lines.push(['Amount Paid:', payment.amount]);
  if (payment.status === PaymentStatus.REFUNDED) {
    lines.push(['Refunded:', payment.refundedAmount]);
    lines.push(['Net Amount:', subtractAmounts(payment.amount, payment.refundedAmount)]);
  }
  return lines;
}

@Injectable()
export class ReceiptService {
  private readonly logger = new Logger(ReceiptService.name);

  constructor(private readonly financeService: FinanceService) {}

  async renderReceipt(actor: ActorContext, paymentId: string): Promise<RenderedReceipt> {
    const payment = await this.financeService.getPayment(actor, paymentId);
    if (payment.status === PaymentStatus.PENDING) {
      throw new UnprocessableEntityException('Receipts are issued for completed payments only');
    }
    const content = await this.render(payment);
    this.logger.debug(`Rendered receipt ${payment.receiptNumber} (${content.length} bytes)`);
    return { filename: `${payment.receiptNumber}.pdf`, content };
  }

  render(payment: Payment): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const doc = new PDFDocument({ margin: 40, size: 'A4' });
      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      const width = doc.page.width - 80;
      const schoolName = payment.school ? payment.school.name : 'School';

      doc.rect(40, 40, width, 80).fillAndStroke('#f8f9fa', '#ddd');
      doc.fontSize(20).font('Helvetica-Bold').fillColor('#2c3e50').text(schoolName, 60, 60, { width: width - 40 });
      const contact = [payment.school?.address, payment.school?.phone, payment.school?.email].filter(Boolean).join(' | ');
      if (contact) {
        doc.fontSize(10).font('Helvetica').fillColor('#6c757d').text(contact, 60, 90, { width: width - 40 });
      }

      doc.rect(40, 140, width, 36).fillAndStroke('#007bff', '#0056b3');
      doc.fontSize(16).font('Helvetica-Bold').fillColor('white').text('FEE PAYMENT RECEIPT', 40, 150, {
        align: 'center',
        width,
      });

      let y = 200;
      for (const [label, value] of receiptLines(payment)) {
        doc.fontSize(12).font('Helvetica-Bold').fillColor('#495057').text(label, 70, y);
        doc.font('Helvetica').fillColor('#2c3e50').text(value, 300, y);
        doc.strokeColor('#f1f3f4').moveTo(70, y + 20).lineTo(doc.page.width - 70, y + 20).stroke();
        y += 28;
      }

      if (payment.status === PaymentStatus.REFUNDED) {
        doc.fontSize(28).font('Helvetica-Bold').fillColor('#dc3545').text('REFUNDED', 40, y + 20, {
          align: 'center',
          width,
        });
      }

      doc
        .fontSize(9)
        .font('Helvetica-Oblique')
        .fillColor('#6c757d')
        .text('This is a computer generated receipt and needs no signature.', 40, doc.page.height - 100, {
          align: 'center',
          width,
        });
      doc.end();
    });
  }
}
