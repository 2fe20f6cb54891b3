// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

export class PathEx {
  /**
   * Joins the given paths. This is a wrapper around path.join that normalizes the result.
   * @param paths
   */
  public static join(...paths: string[]): string {
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths. This is a wrapper around path.resolve.
   * @param paths
   */
  public static resolve(...paths: string[]): string {
    return path.resolve(...paths);
  }

  /**
   * Returns the path of `target` relative to `from`, using forward slashes on every platform.
   */
  public static relative(from: string, target: string): string {
    return path.relative(from, target).split(path.sep).join('/');
  }
}
