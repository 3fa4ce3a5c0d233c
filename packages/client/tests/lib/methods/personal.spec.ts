// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { InvalidArgumentError } from '../../../src/lib/errors/InvalidArgumentError';
import { ADDRESS, OTHER_ADDRESS, shape } from '../../helpers';

describe('personal methods', () => {
  const password = 'test-password';

  it('should send the address alone for personal_lockAccount', () => {
    expect(shape('personalLockAccount', ADDRESS)).to.deep.eq([ADDRESS]);
    expect(shape('personal_lockAccount', ADDRESS)).to.deep.eq([ADDRESS]);
  });

  describe('personal_unlockAccount', () => {
    it('should keep the duration slot as null when it is not given', () => {
      expect(shape('personalUnlockAccount', ADDRESS, password)).to.deep.eq([ADDRESS, password, null]);
    });

    it('should encode the duration as a quantity', () => {
      expect(shape('personalUnlockAccount', ADDRESS, password, 300)).to.deep.eq([ADDRESS, password, '0x12c']);
      expect(shape('personalUnlockAccount', ADDRESS, password, 0)).to.deep.eq([ADDRESS, password, '0x0']);
    });

    it('should require the password', () => {
      expect(() => shape('personalUnlockAccount', ADDRESS)).to.throw(
        InvalidArgumentError,
        'Invalid arguments: password parameter must be provided.',
      );
    });
  });

  describe('personal_sendTransaction', () => {
    it('should format the transaction and append the password', () => {
      expect(
        shape('personalSendTransaction', { from: ADDRESS, to: OTHER_ADDRESS, value: 1000000000000000000n }, password),
      ).to.deep.eq([{ from: ADDRESS, to: OTHER_ADDRESS, value: '0xde0b6b3a7640000' }, password]);
    });

    it('should require the password', () => {
      expect(() => shape('personalSendTransaction', { from: ADDRESS })).to.throw(
        InvalidArgumentError,
        'password parameter must be provided.',
      );
    });

    it('should require the sender', () => {
      expect(() => shape('personalSendTransaction', { to: OTHER_ADDRESS }, password)).to.throw(
        InvalidArgumentError,
        'from parameter must be provided.',
      );
    });
  });

  it('should pass the remaining parameters through in order', () => {
    const signature =
      '0x5b6693f153b48ec1c706ba4169960386dbaa6903e249cc79a8e6ddc434451d417e1e57327872c7f538beeb323c300afa9999a3d4a5de6caf3be0d5ef832b67ef1c';
    expect(shape('personalEcRecover', '0xdeadbeaf', signature)).to.deep.eq(['0xdeadbeaf', signature]);
    expect(shape('personalImportRawKey', 'cd3376bb711cb332ee3fb2ca04c6a8b9f70c316fcdf7a1f44ef4c7999483295e', password)).to.deep.eq([
      'cd3376bb711cb332ee3fb2ca04c6a8b9f70c316fcdf7a1f44ef4c7999483295e',
      password,
    ]);
    expect(shape('personalNewAccount', password)).to.deep.eq([password]);
    expect(shape('personalSign', '0xdeadbeaf', ADDRESS, password)).to.deep.eq(['0xdeadbeaf', ADDRESS, password]);
    expect(shape('personalListAccounts')).to.deep.eq([]);
  });
});
