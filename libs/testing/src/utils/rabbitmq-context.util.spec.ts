import {
  createMockRabbitMqContext,
  assertMessageAcked,
  assertMessageNacked,
} from './rabbitmq-context.util';

describe('createMockRabbitMqContext', () => {
  it('should expose the message, channel and pattern through RmqContext', () => {
    const rmq = createMockRabbitMqContext({
      pattern: 'upload.process',
      correlationId: 'corr-1',
    });

    expect(rmq.context.getPattern()).toBe('upload.process');
    expect(rmq.context.getChannelRef()).toBe(rmq.channel);
    expect(rmq.context.getMessage()).toBe(rmq.message);
    expect(rmq.message.properties.headers).toEqual({
      'x-correlation-id': 'corr-1',
    });
  });

  it('should leave the correlation header unset by default', () => {
    const rmq = createMockRabbitMqContext();

    expect(rmq.context.getPattern()).toBe('test.pattern');
    expect(rmq.message.properties.headers).toEqual({});
  });

  it('should encode the payload in the message body', () => {
    const rmq = createMockRabbitMqContext({
      pattern: 'summary.recompute',
      payload: { batchId: 'b-1' },
    });

    expect(JSON.parse(rmq.message.content.toString())).toEqual({
      pattern: 'summary.recompute',
      data: { batchId: 'b-1' },
    });
  });

  describe('assertions', () => {
    it('should pass assertMessageAcked after an ack', () => {
      const rmq = createMockRabbitMqContext();
      rmq.channel.ack(rmq.message);

      assertMessageAcked(rmq);
    });

    it('should pass assertMessageNacked with the requeue flag', () => {
      const rmq = createMockRabbitMqContext();
      rmq.channel.nack(rmq.message, false, true);

      assertMessageNacked(rmq, true);
    });
  });
});
