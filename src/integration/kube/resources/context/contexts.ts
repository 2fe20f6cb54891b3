// SPDX-License-Identifier: Apache-2.0

export interface Contexts {
  /**
   * Read the current context in the kubeconfig
   */
  readCurrent(): string;
}
