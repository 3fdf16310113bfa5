import { hostSlug, operationName, operationSlug } from '../SpanVocabulary';
import { ScriptedRandom } from './ScriptedRandom';

describe('SpanVocabulary', () => {
  test('operationSlug strips the service suffix and dashes', () => {
    expect(operationSlug('PaymentService')).toBe('payment');
    expect(operationSlug('payment-service')).toBe('payment');
    expect(operationSlug('Service')).toBe('default');
  });

  test('operationName fills both placeholders', () => {
    expect(operationName(new ScriptedRandom([0]), 'payment-service', 'grpc')).toBe(
      'payment.PaymentService/Process',
    );
    expect(operationName(new ScriptedRandom([0.99]), 'Orders', 'rest')).toBe(
      'GET /api/orders/health',
    );
  });

  test('unknown service types use the REST patterns', () => {
    expect(operationName(new ScriptedRandom([0.2]), 'Ledger', 'soap')).toBe(
      'GET /api/ledger/status',
    );
  });

  test('hostSlug dashes spaces', () => {
    expect(hostSlug('Payment Gateway')).toBe('payment-gateway');
  });
});
