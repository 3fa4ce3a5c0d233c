// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { InvalidArgumentError } from '../../../src/lib/errors/InvalidArgumentError';
import { methodRegistry } from '../../../src/lib/methods';
import { ADDRESS, BLOCK_HASH, shape } from '../../helpers';

describe('parity methods', () => {
  describe('parity_listAccounts', () => {
    it('should keep the address slot as null', () => {
      expect(shape('parityListAccounts', 5)).to.deep.eq(['0x5', null]);
      expect(shape('parityListAccounts', 5, ADDRESS)).to.deep.eq(['0x5', ADDRESS]);
    });

    it('should append the block only when given', () => {
      expect(shape('parityListAccounts', 5, undefined, 'latest')).to.deep.eq(['0x5', null, 'latest']);
      expect(shape('parityListAccounts', 5, ADDRESS, 10)).to.deep.eq(['0x5', ADDRESS, '0xa']);
    });

    it('should require the quantity', () => {
      expect(() => shape('parityListAccounts')).to.throw(InvalidArgumentError, 'quantity parameter must be provided.');
    });
  });

  describe('parity_listStorageKeys', () => {
    it('should keep the hash slot as null', () => {
      expect(shape('parityListStorageKeys', ADDRESS, 5)).to.deep.eq([ADDRESS, '0x5', null]);
    });

    it('should append the block only when given', () => {
      expect(shape('parityListStorageKeys', ADDRESS, 5, undefined, 'latest')).to.deep.eq([ADDRESS, '0x5', null, 'latest']);
      expect(shape('parityListStorageKeys', ADDRESS, 5, '0x0', 1)).to.deep.eq([ADDRESS, '0x5', '0x0', '0x1']);
    });
  });

  it('should encode request ids as quantities', () => {
    expect(shape('parityCheckRequest', 1)).to.deep.eq(['0x1']);
  });

  it('should default the block header to latest', () => {
    expect(shape('parityGetBlockHeaderByNumber')).to.deep.eq(['latest']);
    expect(shape('parityGetBlockHeaderByNumber', 255)).to.deep.eq(['0xff']);
  });

  it('should format composed and posted transactions', () => {
    expect(shape('parityComposeTransaction', { from: ADDRESS })).to.deep.eq([{ from: ADDRESS }]);
    expect(shape('parityPostTransaction', { from: ADDRESS, gas: 21000 })).to.deep.eq([{ from: ADDRESS, gas: '0x5208' }]);
  });

  it('should pass signing parameters through', () => {
    expect(shape('paritySignMessage', ADDRESS, 'test-password', BLOCK_HASH)).to.deep.eq([
      ADDRESS,
      'test-password',
      BLOCK_HASH,
    ]);
    expect(shape('parityNewVault', 'vault', 'test-password')).to.deep.eq(['vault', 'test-password']);
  });

  it('should mark parity_netChain as deprecated', () => {
    expect(methodRegistry.get('parityNetChain')?.deprecated).to.be.true;
    expect(methodRegistry.get('parityChain')?.deprecated).to.be.false;
    expect(shape('parityNetChain')).to.deep.eq([]);
  });
});

describe('parity accounts methods', () => {
  const password = 'test-password';

  it('should default the derivation to a hard, unsaved one', () => {
    expect(shape('parityDeriveAddressHash', ADDRESS, password, BLOCK_HASH)).to.deep.eq([
      ADDRESS,
      password,
      { hash: BLOCK_HASH, type: 'hard' },
      false,
    ]);
    expect(shape('parityDeriveAddressHash', ADDRESS, password, BLOCK_HASH, 'soft', true)).to.deep.eq([
      ADDRESS,
      password,
      { hash: BLOCK_HASH, type: 'soft' },
      true,
    ]);
  });

  it('should send the derivation path as a list', () => {
    const path = [
      { index: 1, type: 'soft' },
      { index: 2, type: 'hard' },
    ];
    expect(shape('parityDeriveAddressIndex', ADDRESS, password, path)).to.deep.eq([ADDRESS, password, path, false]);
  });

  it('should collect variadic addresses into one list', () => {
    const other = '0x0000000000000000000000000000000000000001';
    expect(shape('parityImportGethAccounts', ADDRESS, other)).to.deep.eq([[ADDRESS, other]]);
    expect(shape('parityImportGethAccounts')).to.deep.eq([[]]);
    expect(shape('paritySetNewDappsAddresses', ADDRESS)).to.deep.eq([[ADDRESS]]);
    expect(shape('paritySetDappAddresses', 'web', ADDRESS, other)).to.deep.eq(['web', [ADDRESS, other]]);
    expect(shape('paritySetDappAddresses', 'web')).to.deep.eq(['web', []]);
  });

  it('should require both passwords', () => {
    expect(() => shape('parityChangePassword', ADDRESS, 'old-password')).to.throw(
      InvalidArgumentError,
      'newPassword parameter must be provided.',
    );
  });
});

describe('parity set methods', () => {
  it('should default the gas targets to zero', () => {
    expect(shape('paritySetGasCeilTarget')).to.deep.eq(['0x0']);
    expect(shape('paritySetGasCeilTarget', 3000000)).to.deep.eq(['0x2dc6c0']);
    expect(shape('paritySetGasFloorTarget', 1000)).to.deep.eq(['0x3e8']);
  });

  it('should encode limits and prices as quantities', () => {
    expect(shape('paritySetMaxTransactionGas', 100000)).to.deep.eq(['0x186a0']);
    expect(shape('paritySetMinGasPrice', 1000)).to.deep.eq(['0x3e8']);
    expect(shape('paritySetTransactionsLimit', 10)).to.deep.eq(['0xa']);
  });

  it('should reject a negative limit', () => {
    expect(() => shape('paritySetTransactionsLimit', -1)).to.throw(
      InvalidArgumentError,
      "limit must be a non-negative integer, got '-1'.",
    );
  });

  it('should pass string parameters through', () => {
    expect(shape('paritySetMode', 'active')).to.deep.eq(['active']);
    expect(shape('paritySetChain', 'foundation')).to.deep.eq(['foundation']);
    expect(shape('parityDropNonReservedPeers')).to.deep.eq([]);
  });
});
