import { Injectable } from '@nestjs/common';
import { PaymentProcessor, PaymentRequest, PaymentResult, RefundRequest } from './payment-processor';

/** Offline payment: the order is recorded and the shopper mails the money. */
@Injectable()
export class MoneyOrderProcessor extends PaymentProcessor {
  readonly code = 'moneyorder';

  async charge(request: PaymentRequest): Promise<PaymentResult> {
    return {
      transactionType: 'INIT',
      amount: request.amount,
      reference: null,
      details: { payTo: request.keys.address ?? '' },
    };
  }

  async refund(request: RefundRequest): Promise<PaymentResult> {
    return { transactionType: 'REFUND', amount: request.amount, reference: null, details: { offline: 'true' } };
  }
}
