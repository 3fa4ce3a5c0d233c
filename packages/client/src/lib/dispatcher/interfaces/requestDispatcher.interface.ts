// SPDX-License-Identifier: Apache-2.0

export interface IRequestDispatcher<R> {
  dispatch(name: string, args: readonly unknown[]): Promise<R>;
}
