import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Message } from '@parley/core';
import {
  InvalidStateTransitionError,
  MessageBuilder,
  Performative,
  ProtocolError,
  ReplyTimeoutError,
  UnknownAgentError,
  createMessage,
} from '@parley/core';
import { Exchange, RequestReply } from '../src/request-reply.js';
import { Router } from '../src/router.js';

function message(
  sender: string,
  receiver: string,
  content: string,
  performative: Performative = Performative.REQUEST,
): Message {
  return createMessage({ sender, receiver, performative, content });
}

async function sendOrFail(rr: RequestReply, request: Message): Promise<Exchange> {
  const sent = await rr.sendRequest(request);
  if (!sent.ok) throw sent.error;
  return sent.value;
}

describe('RequestReply', () => {
  let router: Router;
  let rr: RequestReply;

  beforeEach(() => {
    router = new Router();
    router.register('R');
    router.register('P');
    rr = new RequestReply({ router, requester: 'R', responder: 'P', timeoutMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('correlates a request with its reply', async () => {
    const req = message('R', 'P', 'ping');
    const exchange = await sendOrFail(rr, req);

    expect(exchange.state).toBe('request-sent');
    expect(exchange.request.id).toBe(req.id);
    expect(exchange.request.conversationId).toBe(exchange.conversationId);
    expect(rr.pending()).toEqual([exchange.conversationId]);

    const incoming = await rr.receiveRequest();
    if (incoming.status !== 'received') throw new Error(`unexpected ${incoming.status}`);
    expect(incoming.message.id).toBe(req.id);
    expect(incoming.message.content).toBe('ping');

    const sent = await rr.sendReply(incoming.message, message('P', 'R', 'pong', Performative.INFORM));
    expect(sent.ok).toBe(true);
    if (sent.ok) {
      expect(sent.value.inReplyTo).toBe(req.id);
      expect(sent.value.conversationId).toBe(exchange.conversationId);
    }

    const outcome = await rr.receiveReply();
    expect(outcome.status).toBe('replied');
    if (outcome.status === 'replied') expect(outcome.message.content).toBe('pong');
    expect(exchange.state).toBe('replied');
    expect(rr.pending()).toEqual([]);
  });

  it('keeps a conversation id the request already has', async () => {
    const req = new MessageBuilder()
      .sender('R')
      .receiver('P')
      .performative(Performative.QUERY)
      .content('status?')
      .conversationId('conv-1')
      .build();

    const exchange = await sendOrFail(rr, req);

    expect(exchange.conversationId).toBe('conv-1');
    expect(exchange.request).toBe(req);
  });

  it('times out when the responder never replies', async () => {
    vi.useFakeTimers();
    const exchange = await sendOrFail(rr, message('R', 'P', 'anyone?'));
    const inbox = router.getMailbox('R');

    const pending = rr.receiveReply();
    vi.advanceTimersByTime(999);
    expect(inbox?.waitingReceivers).toBe(1);
    vi.advanceTimersByTime(1);

    const outcome = await pending;
    expect(outcome.status).toBe('timed-out');
    if (outcome.status === 'timed-out') {
      expect(outcome.error).toBeInstanceOf(ReplyTimeoutError);
      expect(outcome.error.code).toBe('REPLY_TIMEOUT');
      expect(outcome.error.timeoutMs).toBe(1000);
      expect(outcome.error.requestId).toBe(exchange.request.id);
    }
    expect(exchange.state).toBe('timed-out');
    expect(inbox?.waitingReceivers).toBe(0);
    expect(rr.pending()).toEqual([]);
  });

  it('counts the default deadline from when the request was sent', async () => {
    vi.useFakeTimers();
    await sendOrFail(rr, message('R', 'P', 'slow'));
    vi.advanceTimersByTime(600);

    const pending = rr.receiveReply();
    vi.advanceTimersByTime(400);

    const outcome = await pending;
    expect(outcome.status === 'timed-out' && outcome.error.timeoutMs).toBe(400);
  });

  it('accepts an explicit timeout per wait', async () => {
    vi.useFakeTimers();
    await sendOrFail(rr, message('R', 'P', 'quick?'));

    const pending = rr.receiveReply(undefined, { timeoutMs: 10 });
    vi.advanceTimersByTime(10);

    const outcome = await pending;
    expect(outcome.status === 'timed-out' && outcome.error.timeoutMs).toBe(10);
  });

  it('leaves a late reply in the requester mailbox', async () => {
    vi.useFakeTimers();
    const exchange = await sendOrFail(rr, message('R', 'P', 'late'));
    const pending = rr.receiveReply();
    vi.advanceTimersByTime(1000);
    await pending;

    await rr.sendReply(exchange.request, message('P', 'R', 'sorry', Performative.INFORM));

    expect(router.getMailbox('R')?.tryReceive()?.content).toBe('sorry');
  });

  it('leaves unrelated traffic in the requester mailbox, in order', async () => {
    const exchange = await sendOrFail(rr, message('R', 'P', 'ping'));
    const pending = rr.receiveReply();

    await router.route(message('P', 'R', 'noise-1', Performative.INFORM));
    await router.route(
      createMessage({
        sender: 'P',
        receiver: 'R',
        performative: Performative.INFORM,
        content: 'same conversation, not a reply',
        conversationId: exchange.conversationId,
      }),
    );
    await router.route(message('P', 'R', 'noise-2', Performative.INFORM));
    await rr.sendReply(exchange.request, message('P', 'R', 'pong', Performative.INFORM));

    const outcome = await pending;
    expect(outcome.status === 'replied' && outcome.message.content).toBe('pong');
    expect(router.getMailbox('R')?.drain().map((m) => m.content)).toEqual([
      'noise-1',
      'same conversation, not a reply',
      'noise-2',
    ]);
  });

  it('finds a reply that arrived before the wait started', async () => {
    const exchange = await sendOrFail(rr, message('R', 'P', 'ping'));
    await router.route(message('P', 'R', 'noise', Performative.INFORM));
    await rr.sendReply(exchange.request, message('P', 'R', 'pong', Performative.INFORM));

    const outcome = await rr.receiveReply(exchange.conversationId);
    expect(outcome.status === 'replied' && outcome.message.content).toBe('pong');
    expect(router.getMailbox('R')?.size()).toBe(1);
  });

  it('keeps concurrent exchanges apart', async () => {
    const first = await sendOrFail(rr, message('R', 'P', 'one'));
    const second = await sendOrFail(rr, message('R', 'P', 'two'));

    await rr.sendReply(second.request, message('P', 'R', 'reply-two', Performative.INFORM));
    await rr.sendReply(first.request, message('P', 'R', 'reply-one', Performative.INFORM));

    const one = await rr.receiveReply(first.conversationId);
    const two = await rr.receiveReply(second.conversationId);
    expect(one.status === 'replied' && one.message.content).toBe('reply-one');
    expect(two.status === 'replied' && two.message.content).toBe('reply-two');
  });

  it('cancels the wait when the signal aborts', async () => {
    const exchange = await sendOrFail(rr, message('R', 'P', 'ping'));
    const controller = new AbortController();

    const pending = rr.receiveReply(undefined, { signal: controller.signal });
    controller.abort();

    expect(await pending).toEqual({ status: 'cancelled' });
    expect(exchange.state).toBe('cancelled');
    expect(rr.pending()).toEqual([]);
  });

  it('reports closed when the requester is deregistered mid-wait', async () => {
    const exchange = await sendOrFail(rr, message('R', 'P', 'ping'));
    const pending = rr.receiveReply();

    router.deregister('R');

    expect(await pending).toEqual({ status: 'closed' });
    expect(exchange.state).toBe('cancelled');
  });

  it('request() sends and waits in one call', async () => {
    const responder = (async () => {
      const incoming = await rr.receiveRequest();
      if (incoming.status === 'received') {
        await rr.sendReply(incoming.message, message('P', 'R', 'pong', Performative.AGREE));
      }
    })();

    const outcome = await rr.request(message('R', 'P', 'ping'));
    await responder;

    expect(outcome.status).toBe('replied');
    if (outcome.status === 'replied') {
      expect(outcome.message.content).toBe('pong');
      expect(outcome.message.performative).toBe(Performative.AGREE);
    }
  });

  describe('with blocking mailboxes', () => {
    let blocking: Router;
    let brr: RequestReply;

    beforeEach(() => {
      blocking = new Router({ mailbox: { capacity: 1, overflow: 'block' } });
      blocking.register('R');
      blocking.register('P');
      brr = new RequestReply({ router: blocking, requester: 'R', responder: 'P', timeoutMs: 1000 });
    });

    it('delivers a reply sent while other senders are parked on the requester', async () => {
      const exchange = await sendOrFail(brr, message('R', 'P', 'ping'));
      await blocking.route(message('P', 'R', 'noise-1', Performative.INFORM));
      const parkedNoise = blocking.route(message('P', 'R', 'noise-2', Performative.INFORM));
      const pending = brr.receiveReply();

      const sent = await brr.sendReply(exchange.request, message('P', 'R', 'pong', Performative.INFORM));

      expect(sent.ok).toBe(true);
      const outcome = await pending;
      expect(outcome.status === 'replied' && outcome.message.content).toBe('pong');
      const inbox = blocking.getMailbox('R');
      expect(inbox?.blockedSenders).toBe(1);
      expect(inbox?.drain().map((m) => m.content)).toEqual(['noise-1']);
      expect((await parkedNoise).ok).toBe(true);
    });

    it('keeps a request parked on the responder out of pending', async () => {
      await blocking.route(message('X', 'P', 'backlog', Performative.INFORM));
      const req = createMessage({
        sender: 'R',
        receiver: 'P',
        performative: Performative.REQUEST,
        content: 'queued',
        conversationId: 'conv-parked',
      });
      const sending = brr.sendRequest(req);

      expect(brr.pending()).toEqual([]);
      await expect(brr.receiveReply()).rejects.toThrow(ProtocolError);
      await expect(brr.receiveReply('conv-parked')).rejects.toThrow(ProtocolError);
      await expect(brr.sendRequest(req)).rejects.toThrow('already has an outstanding request');

      blocking.getMailbox('P')?.drain();
      const sent = await sending;

      expect(sent.ok).toBe(true);
      if (sent.ok) expect(sent.value.state).toBe('request-sent');
      expect(brr.pending()).toEqual(['conv-parked']);
    });
  });

  describe('delivery failures', () => {
    it('records no exchange when the responder is unknown', async () => {
      const lonely = new RequestReply({ router, requester: 'R', responder: 'Q' });

      const sent = await lonely.sendRequest(message('R', 'Q', 'hello?'));

      expect(sent.ok).toBe(false);
      if (!sent.ok) expect(sent.error).toBeInstanceOf(UnknownAgentError);
      expect(lonely.pending()).toEqual([]);
    });

    it('request() reports undeliverable', async () => {
      router.deregister('P');
      const outcome = await rr.request(message('R', 'P', 'ping'));
      expect(outcome.status).toBe('undeliverable');
    });
  });

  describe('responder side', () => {
    it('hands back messages the filter rejects', async () => {
      await router.route(message('X', 'P', 'chatter', Performative.INFORM));
      const req = message('R', 'P', 'ping');
      await sendOrFail(rr, req);
      const isRequest = (m: Message): boolean => m.performative === Performative.REQUEST;

      const first = await rr.receiveRequest({ match: isRequest });
      expect(first.status).toBe('unmatched');
      if (first.status === 'unmatched') expect(first.message.content).toBe('chatter');

      const second = await rr.receiveRequest({ match: isRequest });
      expect(second.status === 'received' && second.message.id).toBe(req.id);
    });

    it('times out like a plain receive', async () => {
      expect(await rr.receiveRequest({ timeoutMs: 0 })).toEqual({ status: 'timed-out' });
    });
  });

  describe('misuse', () => {
    it('rejects a request between the wrong agents', async () => {
      await expect(rr.sendRequest(message('P', 'R', 'backwards'))).rejects.toThrow(ProtocolError);
    });

    it('rejects a duplicate outstanding conversation', async () => {
      const req = createMessage({
        sender: 'R',
        receiver: 'P',
        performative: Performative.REQUEST,
        content: 'once',
        conversationId: 'conv-dup',
      });
      await sendOrFail(rr, req);
      await expect(rr.sendRequest(req)).rejects.toThrow('Conversation "conv-dup" already has an outstanding request');
    });

    it('rejects a reply going to the wrong agent', async () => {
      const exchange = await sendOrFail(rr, message('R', 'P', 'ping'));
      await expect(
        rr.sendReply(exchange.request, message('P', 'X', 'misdirected', Performative.INFORM)),
      ).rejects.toThrow(ProtocolError);
    });

    it('rejects a reply to a request without a conversation', async () => {
      await expect(
        rr.sendReply(message('R', 'P', 'raw'), message('P', 'R', 'pong', Performative.INFORM)),
      ).rejects.toThrow('has no conversation id');
    });

    it('rejects waiting with nothing outstanding', async () => {
      await expect(rr.receiveReply()).rejects.toThrow(ProtocolError);
      await expect(rr.receiveReply('nope')).rejects.toThrow('No outstanding request in conversation "nope"');
    });

    it('rejects an ambiguous wait', async () => {
      await sendOrFail(rr, message('R', 'P', 'one'));
      await sendOrFail(rr, message('R', 'P', 'two'));
      await expect(rr.receiveReply()).rejects.toThrow('Expected exactly one outstanding request, found 2');
    });

    it('rejects a second wait on the same exchange', async () => {
      const exchange = await sendOrFail(rr, message('R', 'P', 'ping'));
      const first = rr.receiveReply();

      await expect(rr.receiveReply(exchange.conversationId)).rejects.toThrow('Already awaiting');

      await rr.sendReply(exchange.request, message('P', 'R', 'pong', Performative.INFORM));
      expect((await first).status).toBe('replied');
    });
  });
});

describe('Exchange', () => {
  it('allows only the documented transitions', () => {
    const exchange = new Exchange(
      createMessage({ sender: 'R', receiver: 'P', performative: Performative.REQUEST, content: 'x' }),
      'conv',
    );
    expect(() => exchange.transition('replied')).toThrow(InvalidStateTransitionError);
    expect(() => exchange.transition('replied')).toThrow('Invalid state transition: idle → replied');

    exchange.transition('request-sent');
    exchange.transition('timed-out');
    expect(() => exchange.transition('replied')).toThrow(InvalidStateTransitionError);
    expect(exchange.state).toBe('timed-out');
  });
});
