// SPDX-License-Identifier: Apache-2.0

import chai, { expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import pino from 'pino';
import { Registry } from 'prom-client';

import { required } from '../../../src/formatters';
import constants from '../../../src/lib/constants';
import { createRequest, RequestDispatcher } from '../../../src/lib/dispatcher/requestDispatcher';
import { InvalidArgumentError } from '../../../src/lib/errors/InvalidArgumentError';
import { methodRegistry } from '../../../src/lib/methods';
import { defineMethod } from '../../../src/lib/registry/methodDescriptor';
import { MethodRegistry } from '../../../src/lib/registry/methodRegistry';
import { ADDRESS, flushPromises, RecordingTransport } from '../../helpers';

chai.use(chaiAsPromised);

interface LogEntry {
  level: number;
  name: string;
  msg: string;
}

const REQUEST_ID_PREFIX = /^\[Request ID: [0-9a-f-]{36}\] /;

describe('RequestDispatcher', () => {
  let transport: RecordingTransport<string>;
  let lines: string[];
  let dispatcher: RequestDispatcher<string>;

  const logEntries = (): LogEntry[] => lines.map((line): LogEntry => JSON.parse(line));

  beforeEach(() => {
    transport = new RecordingTransport<string>();
    lines = [];
    const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
    dispatcher = new RequestDispatcher(methodRegistry, transport, logger);
  });

  describe('createRequest', () => {
    it('should build a frozen JSON-RPC 2.0 envelope', () => {
      const request = createRequest('eth_blockNumber', [], 83);
      expect(request).to.deep.eq({ jsonrpc: '2.0', method: 'eth_blockNumber', params: [], id: 83 });
      expect(Object.isFrozen(request)).to.be.true;
    });
  });

  describe('dispatch', () => {
    it('should send the shaped envelope under the wire name and the fixed id', () => {
      void dispatcher.dispatch('ethGetBalance', [ADDRESS]);

      expect(transport.requests).to.have.lengthOf(1);
      expect(transport.requests[0]).to.deep.eq({
        jsonrpc: '2.0',
        method: 'eth_getBalance',
        params: [ADDRESS, 'latest'],
        id: 1,
      });
      expect(Object.isFrozen(transport.requests[0])).to.be.true;
    });

    it('should accept the wire name', () => {
      void dispatcher.dispatch('eth_blockNumber', []);
      expect(transport.requests[0]).to.deep.eq({ jsonrpc: '2.0', method: 'eth_blockNumber', params: [], id: 83 });
    });

    it('should resolve with the response of the transport', async () => {
      const result = dispatcher.dispatch('netVersion', []);
      transport.responses[0].resolve('{"jsonrpc":"2.0","id":67,"result":"1"}');
      await expect(result).to.eventually.eq('{"jsonrpc":"2.0","id":67,"result":"1"}');
    });

    it('should pass a transport failure through unchanged', async () => {
      const failure = new Error('socket hang up');
      const result = dispatcher.dispatch('netVersion', []);
      transport.responses[0].reject(failure);
      await expect(result).to.be.rejectedWith(failure);
    });

    it('should throw synchronously without sending when the arguments are rejected', () => {
      expect(() => dispatcher.dispatch('ethCall', [{}])).to.throw(
        InvalidArgumentError,
        'Invalid arguments: block parameter must be provided.',
      );
      expect(transport.requests).to.be.empty;
    });

    it('should throw synchronously for an unknown method', () => {
      expect(() => dispatcher.dispatch('eth_chainId', [])).to.throw(
        InvalidArgumentError,
        'Invalid arguments: Method eth_chainId is not registered.',
      );
      expect(transport.requests).to.be.empty;
    });
  });

  describe('logging', () => {
    it('should warn when a deprecated method is called', () => {
      void dispatcher.dispatch('parity_netChain', []);

      const entries = logEntries();
      expect(entries).to.have.lengthOf(1);
      expect(entries[0].level).to.eq(40);
      expect(entries[0].name).to.eq('request-dispatcher');
      expect(entries[0].msg).to.match(REQUEST_ID_PREFIX);
      expect(entries[0].msg.replace(REQUEST_ID_PREFIX, '')).to.eq('Calling deprecated method parityNetChain');
      expect(transport.requests[0].method).to.eq('parity_netChain');
    });

    it('should not warn about a deprecated method whose arguments are rejected', () => {
      const registry = new MethodRegistry([
        defineMethod('parityOldLookup', 'parity_oldLookup', 1, (address: string) => [required(address, 'address')], {
          deprecated: true,
        }),
      ]);
      const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
      dispatcher = new RequestDispatcher(registry, transport, logger);

      expect(() => dispatcher.dispatch('parityOldLookup', [])).to.throw(
        InvalidArgumentError,
        'Invalid arguments: address parameter must be provided.',
      );
      expect(lines).to.be.empty;
      expect(transport.requests).to.be.empty;

      void dispatcher.dispatch('parityOldLookup', [ADDRESS]);
      expect(logEntries().map((entry) => entry.msg.replace(REQUEST_ID_PREFIX, ''))).to.deep.eq([
        'Calling deprecated method parityOldLookup',
      ]);
    });

    it('should not warn for other methods', () => {
      void dispatcher.dispatch('parityChain', []);
      expect(lines).to.be.empty;
    });

    it('should trace every request when the level allows it', () => {
      const logger = pino({ level: 'trace' }, { write: (line: string) => lines.push(line) });
      dispatcher = new RequestDispatcher(methodRegistry, transport, logger);

      void dispatcher.dispatch('ethGetBalance', [ADDRESS]);

      const messages = logEntries().map((entry) => entry.msg.replace(REQUEST_ID_PREFIX, ''));
      expect(messages).to.deep.eq(['Sending eth_getBalance (id 1) with 2 params']);
    });
  });

  describe('metrics', () => {
    let register: Registry;

    beforeEach(() => {
      register = new Registry();
      dispatcher = new RequestDispatcher(methodRegistry, transport, pino({ level: 'silent' }), register);
    });

    it('should count successful requests by method', async () => {
      const first = dispatcher.dispatch('ethGetBalance', [ADDRESS]);
      const second = dispatcher.dispatch('ethGetBalance', [ADDRESS, 'pending']);
      transport.responses[0].resolve('a');
      transport.responses[1].resolve('b');
      await Promise.all([first, second]);

      const exposition = (await register.metrics()).split('\n');
      expect(exposition).to.include(
        `${constants.METRIC_REQUEST_DURATION}_count{method="eth_getBalance",outcome="success"} 2`,
      );
    });

    it('should count failed requests separately', async () => {
      const result = dispatcher.dispatch('netVersion', []);
      transport.responses[0].reject(new Error('connect ECONNREFUSED'));
      await expect(result).to.be.rejectedWith('connect ECONNREFUSED');

      const exposition = (await register.metrics()).split('\n');
      expect(exposition).to.include(`${constants.METRIC_REQUEST_DURATION}_count{method="net_version",outcome="failure"} 1`);
    });

    it('should record nothing for a request that is still pending', async () => {
      void dispatcher.dispatch('netVersion', []);
      await flushPromises();

      const exposition = await register.metrics();
      expect(exposition).not.to.include(`${constants.METRIC_REQUEST_DURATION}_count{`);
    });

    it('should share one histogram between dispatchers on the same registry', async () => {
      const histogram = register.getSingleMetric(constants.METRIC_REQUEST_DURATION);
      const other = new RequestDispatcher(methodRegistry, transport, pino({ level: 'silent' }), register);
      expect(register.getSingleMetric(constants.METRIC_REQUEST_DURATION)).to.equal(histogram);

      const first = dispatcher.dispatch('netVersion', []);
      const second = other.dispatch('netVersion', []);
      transport.responses[0].resolve('a');
      transport.responses[1].resolve('b');
      await Promise.all([first, second]);

      const exposition = (await register.metrics()).split('\n');
      expect(exposition).to.include(`${constants.METRIC_REQUEST_DURATION}_count{method="net_version",outcome="success"} 2`);
    });
  });
});
