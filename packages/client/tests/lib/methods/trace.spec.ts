// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { InvalidArgumentError } from '../../../src/lib/errors/InvalidArgumentError';
import { ADDRESS, OTHER_ADDRESS, shape, TX_HASH } from '../../helpers';

describe('trace methods', () => {
  it('should default trace_block to latest', () => {
    expect(shape('traceBlock')).to.deep.eq(['latest']);
    expect(shape('traceBlock', 3068185)).to.deep.eq(['0x2ed119']);
  });

  describe('trace_call', () => {
    it('should send the call object and the block', () => {
      expect(shape('traceCall', { from: ADDRESS, to: OTHER_ADDRESS, value: 0x186a0 }, 'latest')).to.deep.eq([
        { from: ADDRESS, to: OTHER_ADDRESS, value: '0x186a0' },
        'latest',
      ]);
    });

    it('should require the block', () => {
      expect(() => shape('traceCall', { to: OTHER_ADDRESS })).to.throw(
        InvalidArgumentError,
        'block parameter must be provided.',
      );
    });
  });

  it('should build the filter of trace_filter', () => {
    expect(shape('traceFilter', { fromBlock: 3068100, toBlock: 3068200, address: [ADDRESS] })).to.deep.eq([
      { fromBlock: '0x2ed0c4', toBlock: '0x2ed128', address: [ADDRESS] },
    ]);
    expect(shape('traceFilter')).to.deep.eq([{}]);
  });

  it('should default the trace index to zero', () => {
    expect(shape('traceGet', TX_HASH)).to.deep.eq([TX_HASH, '0x0']);
    expect(shape('traceGet', TX_HASH, 1)).to.deep.eq([TX_HASH, '0x1']);
  });

  it('should send the trace types as a list', () => {
    expect(shape('traceRawTransaction', '0xd46e8dd6', ['trace', 'vmTrace'])).to.deep.eq([
      '0xd46e8dd6',
      ['trace', 'vmTrace'],
    ]);
    expect(shape('traceReplayTransaction', TX_HASH, ['stateDiff'])).to.deep.eq([TX_HASH, ['stateDiff']]);
    expect(() => shape('traceReplayTransaction', TX_HASH)).to.throw(
      InvalidArgumentError,
      'traces parameter must be provided.',
    );
  });

  it('should keep the wire name of trace_RawTransaction', () => {
    expect(shape('trace_RawTransaction', '0x00', ['trace'])).to.deep.eq(['0x00', ['trace']]);
    expect(shape('traceTransaction', TX_HASH)).to.deep.eq([TX_HASH]);
  });
});
