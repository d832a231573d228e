import { UnprocessableEntityException } from '@nestjs/common';
import { ReceiptService, receiptLines } from './receipt.service';
import { FinanceService } from '../finance.service';
import { Payment, PaymentMode, PaymentStatus } from '../entities/payment.entity';
import { financeActor } from '../../../test/support/ledger-fixtures';

const payment = (overrides: Partial<Payment> = {}): Payment =>
  Object.assign(new Payment(), {
    id: 'payment-1',
    receiptNumber: 'RCP-20240510-0001',
    paymentDate: '2024-05-09',
    amount: '4000.00',
    refundedAmount: '0.00',
    paymentMode: PaymentMode.CASH,
    status: PaymentStatus.COMPLETED,
    transactionId: null,
    chequeNo: null,
    bankName: null,
    student: { firstName: 'Asha', lastName: 'Verma', admissionNo: 'ADM-001' },
    feeStructure: { academicYear: '2024-25' },
    school: { name: 'Green Valley School', phone: '+910000000000' },
    ...overrides,
  });

describe('receiptLines', () => {
  it('prints the payment details', () => {
    expect(receiptLines(payment())).toEqual([
      ['Receipt Number:', 'RCP-20240510-0001'],
      ['Payment Date:', '09/05/2024'],
      ['Student Name:', 'Asha Verma'],
      ['Admission No:', 'ADM-001'],
      ['Academic Year:', '2024-25'],
      ['Payment Mode:', 'Cash'],
      ['Amount Paid:', '4000.00'],
    ]);
  });

  it('adds cheque details and the net amount of a refunded payment', () => {
    const lines = receiptLines(
      payment({
        paymentMode: PaymentMode.CHEQUE,
        chequeNo: '004512',
        bankName: 'State Bank',
        status: PaymentStatus.REFUNDED,
        refundedAmount: '1500.00',
      }),
    );

    expect(lines.slice(5)).toEqual([
      ['Payment Mode:', 'Cheque'],
      ['Cheque No:', '004512'],
      ['Bank:', 'State Bank'],
      ['Amount Paid:', '4000.00'],
      ['Refunded:', '1500.00'],
      ['Net Amount:', '2500.00'],
    ]);
  });
});

describe('ReceiptService', () => {
  let financeService: { getPayment: jest.Mock };
  let service: ReceiptService;

  beforeEach(() => {
    financeService = { getPayment: jest.fn() };
    service = new ReceiptService(financeService as unknown as FinanceService);
  });

  it('renders a PDF named after the receipt', async () => {
    financeService.getPayment.mockResolvedValue(payment());

    const receipt = await service.renderReceipt(financeActor, 'payment-1');

    expect(receipt.filename).toBe('RCP-20240510-0001.pdf');
    expect(receipt.content.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(financeService.getPayment).toHaveBeenCalledWith(financeActor, 'payment-1');
  });

  it('issues no receipt for a pending payment', async () => {
    financeService.getPayment.mockResolvedValue(payment({ status: PaymentStatus.PENDING }));

    await expect(service.renderReceipt(financeActor, 'payment-1')).rejects.toBeInstanceOf(UnprocessableEntityException);
  });
});
