import { EntityNotFoundException, PaymentException, ValidationException } from '../common/errors/service.exception';
import { createCatalog, createPayments, TestCatalog, TestPayments } from '../common/testing/catalog';
import { maskSecret } from './payment-modules';

const stripeKeys = { publishableKey: 'pk-placeholder', secretKey: 'test-secret-1234' };

describe('PaymentsService', () => {
  let catalog: TestCatalog;
  let payments: TestPayments;

  beforeEach(async () => {
    catalog = await createCatalog();
    payments = createPayments(catalog);
  });

  it('masks all but the last four characters', () => {
    expect(maskSecret('test-secret-1234')).toBe('****1234');
    expect(maskSecret('abcd')).toBe('****');
  });

  it('lists every module with its configuration state', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', {
      active: true,
      keys: { address: '1 Main Street' },
    });

    const modules = await payments.service.listModules('DEFAULT');

    expect(modules.map((module) => module.code)).toEqual([
      'moneyorder',
      'stripe',
      'paypal-express',
      'braintree',
      'beanstream',
    ]);
    expect(modules[0]).toMatchObject({ configured: true, active: true, type: 'MONEYORDER' });
    expect(modules[1]).toMatchObject({ configured: false, active: false, requiredKeys: ['publishableKey', 'secretKey'] });
  });

  it('stores keys encrypted and returns secrets masked', async () => {
    const saved = await payments.service.saveConfiguration('DEFAULT', 'stripe', { active: true, keys: stripeKeys });

    expect(saved.keys).toEqual({ publishableKey: 'pk-placeholder', secretKey: '****1234' });
    expect(saved.environment).toBe('TEST');
    const [row] = await payments.configurations.list();
    expect(row.Keys).not.toContain('test-secret');
    expect(payments.encryption.decrypt(row.Keys)).toEqual(stripeKeys);
  });

  it('keeps a stored key when its masked value is sent back', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'stripe', { active: true, keys: stripeKeys });

    await payments.service.saveConfiguration('DEFAULT', 'stripe', {
      keys: { publishableKey: 'pk-placeholder-2', secretKey: '****1234' },
      environment: 'PRODUCTION',
    });

    const [row] = await payments.configurations.list();
    expect(payments.encryption.decrypt(row.Keys)).toEqual({
      publishableKey: 'pk-placeholder-2',
      secretKey: 'test-secret-1234',
    });
    expect(row.Environment).toBe('PRODUCTION');
    expect(row.Active).toBe(true);
  });

  it('requires every key of an active module', async () => {
    await expect(
      payments.service.saveConfiguration('DEFAULT', 'stripe', { active: true, keys: { publishableKey: 'pk-placeholder' } }),
    ).rejects.toThrow('Module stripe is missing required keys: secretKey');

    const inactive = await payments.service.saveConfiguration('DEFAULT', 'stripe', {
      active: false,
      keys: { publishableKey: 'pk-placeholder' },
    });
    expect(inactive.active).toBe(false);
  });

  it('rejects unknown modules', async () => {
    await expect(payments.service.saveConfiguration('DEFAULT', 'bitcoin', { keys: {} })).rejects.toBeInstanceOf(
      ValidationException,
    );
    await expect(payments.service.getConfiguration('DEFAULT', 'bitcoin')).rejects.toBeInstanceOf(ValidationException);
  });

  it('keeps a single default module per store', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', {
      active: true,
      defaultSelected: true,
      keys: { address: '1 Main Street' },
    });
    await payments.service.saveConfiguration('DEFAULT', 'stripe', {
      active: true,
      defaultSelected: true,
      keys: stripeKeys,
    });

    expect((await payments.service.getConfiguration('DEFAULT', 'moneyorder')).defaultSelected).toBe(false);
    expect((await payments.service.listActive('DEFAULT')).map((module) => module.code)).toEqual([
      'stripe',
      'moneyorder',
    ]);
  });

  it('keeps the previous default when saving the new one fails', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', {
      active: true,
      defaultSelected: true,
      keys: { address: '1 Main Street' },
    });
    jest.spyOn(payments.configurations, 'insert').mockRejectedValueOnce(new Error('insert failed'));

    await expect(
      payments.service.saveConfiguration('DEFAULT', 'stripe', { active: true, defaultSelected: true, keys: stripeKeys }),
    ).rejects.toThrow('insert failed');

    expect((await payments.service.getConfiguration('DEFAULT', 'moneyorder')).defaultSelected).toBe(true);
  });

  it('removes a configuration', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', { keys: { address: '1 Main Street' } });

    await payments.service.removeConfiguration('DEFAULT', 'moneyorder');

    await expect(payments.service.getConfiguration('DEFAULT', 'moneyorder')).rejects.toBeInstanceOf(
      EntityNotFoundException,
    );
  });

  it('accepts only active modules for checkout', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', { keys: { address: '1 Main Street' } });

    await expect(payments.service.assertUsable(catalog.store, 'moneyorder')).rejects.toBeInstanceOf(
      ValidationException,
    );
    await expect(payments.service.assertUsable(catalog.store, 'stripe')).rejects.toBeInstanceOf(ValidationException);
  });

  it('records money orders without moving money', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', {
      active: true,
      keys: { address: '1 Main Street' },
    });

    const result = await payments.service.charge(catalog.store, {
      moduleCode: 'moneyorder',
      amount: 42,
      chargeType: 'AUTHORIZECAPTURE',
      description: 'Order',
      metadata: {},
    });

    expect(result).toEqual({ transactionType: 'INIT', amount: 42, reference: null, details: { payTo: '1 Main Street' } });
  });

  it('passes decrypted keys and the store currency to the processor', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'stripe', { active: true, keys: stripeKeys });
    const charge = jest.spyOn(payments.stripe, 'charge').mockResolvedValue({
      transactionType: 'AUTHORIZECAPTURE',
      amount: 10,
      reference: 'pi_1',
      details: {},
    });

    await payments.service.charge(catalog.store, {
      moduleCode: 'stripe',
      amount: 10,
      chargeType: 'AUTHORIZECAPTURE',
      paymentToken: 'pm_card_placeholder',
      description: 'Order',
      metadata: { cartCode: 'abc' },
    });

    expect(charge).toHaveBeenCalledWith({
      amount: 10,
      currency: 'CAD',
      chargeType: 'AUTHORIZECAPTURE',
      keys: stripeKeys,
      environment: 'TEST',
      paymentToken: 'pm_card_placeholder',
      description: 'Order',
      metadata: { cartCode: 'abc' },
    });
  });

  it('cannot process payments through configuration-only modules', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'braintree', {
      active: true,
      keys: { merchant_id: 'm', public_key: 'p', private_key: 'k', tokenization_key: 't' },
    });

    await expect(
      payments.service.charge(catalog.store, {
        moduleCode: 'braintree',
        amount: 1,
        chargeType: 'AUTHORIZECAPTURE',
        description: 'Order',
        metadata: {},
      }),
    ).rejects.toBeInstanceOf(PaymentException);
  });

  it('caps cumulative refunds at the order total', async () => {
    await payments.service.saveConfiguration('DEFAULT', 'moneyorder', {
      active: true,
      keys: { address: '1 Main Street' },
    });
    const order = { moduleCode: 'moneyorder', total: 50, refunded: 30, reference: null };

    await expect(payments.service.refund(catalog.store, order, 20.01)).rejects.toThrow(
      'Refund of 20.01 exceeds the refundable 20',
    );
    await expect(payments.service.refund(catalog.store, order, 0)).rejects.toBeInstanceOf(ValidationException);
    await expect(payments.service.refund(catalog.store, order, 20)).resolves.toMatchObject({
      transactionType: 'REFUND',
      amount: 20,
    });
  });
});
