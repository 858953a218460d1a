import { Injectable, Logger } from '@nestjs/common';
import Stripe from 'stripe';
import { PaymentException } from '../../common/errors/service.exception';
import { errorMessage } from '../../common/utils/errors';
import { toCents } from '../../common/utils/money';
import { PaymentProcessor, PaymentRequest, PaymentResult, RefundRequest } from './payment-processor';

@Injectable()
export class StripePaymentProcessor extends PaymentProcessor {
  readonly code = 'stripe';
  private readonly logger = new Logger(StripePaymentProcessor.name);
  /** One client per secret key; stores may use different Stripe accounts. */
  private readonly clients = new Map<string, Stripe>();

  async charge(request: PaymentRequest): Promise<PaymentResult> {
    if (!request.paymentToken) {
      throw new PaymentException('A Stripe payment method is required');
    }
    const stripe = this.client(request.keys);
    const captureMethod = request.chargeType === 'AUTHORIZE' ? 'manual' : 'automatic';

    let intent: Stripe.PaymentIntent;
    try {
      intent = await stripe.paymentIntents.create({
        amount: toCents(request.amount),
        currency: request.currency.toLowerCase(),
        payment_method: request.paymentToken,
        payment_method_types: ['card'],
        capture_method: captureMethod,
        confirm: true,
        description: request.description,
        metadata: request.metadata,
      });
    } catch (error) {
      this.logger.error(`Stripe payment of ${request.amount} ${request.currency} failed: ${errorMessage(error)}`);
      throw new PaymentException(`Stripe payment failed: ${errorMessage(error)}`, error);
    }

    const expected = captureMethod === 'manual' ? 'requires_capture' : 'succeeded';
    if (intent.status !== expected) {
      throw new PaymentException(`Stripe payment ${intent.id} is ${intent.status}`);
    }
    this.logger.log(`Stripe payment ${intent.id} ${intent.status}`);
    return {
      transactionType: request.chargeType,
      amount: request.amount,
      reference: intent.id,
      details: { status: intent.status },
    };
  }

  async refund(request: RefundRequest): Promise<PaymentResult> {
    if (!request.reference) {
      throw new PaymentException('There is no Stripe payment to refund');
    }
    const stripe = this.client(request.keys);
    try {
      const refund = await stripe.refunds.create({
        payment_intent: request.reference,
        amount: toCents(request.amount),
      });
      this.logger.log(`Stripe refund ${refund.id} of ${request.reference}: ${refund.status}`);
      return {
        transactionType: 'REFUND',
        amount: request.amount,
        reference: refund.id,
        details: { status: refund.status ?? 'unknown', paymentIntent: request.reference },
      };
    } catch (error) {
      throw new PaymentException(`Stripe refund failed: ${errorMessage(error)}`, error);
    }
  }

  private client(keys: Record<string, string>): Stripe {
    const secretKey = keys.secretKey;
    if (!secretKey) {
      throw new PaymentException('Stripe secret key is not configured');
    }
    let client = this.clients.get(secretKey);
    if (!client) {
      client = new Stripe(secretKey);
      this.clients.set(secretKey, client);
    }
    return client;
  }
}
