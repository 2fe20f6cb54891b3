// SPDX-License-Identifier: Apache-2.0

import {ManifestLoadError} from '../errors/manifest-load-error.js';

export type Variables = Readonly<Record<string, string | undefined>>;

// $${NAME} | ${NAME} | ${NAME:-fallback}
const PLACEHOLDER = /\$(\$?)\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Replaces `${NAME}` and `${NAME:-fallback}` placeholders in manifest text. The fallback is used when the
 * variable is unset or empty. `$${NAME}` yields the literal text `${NAME}`.
 */
export class VariableInterpolator {
  private constructor() {}

  /**
   * @param text - raw file content
   * @param variables - values to substitute
   * @param source - file name used in error messages
   * @throws ManifestLoadError when a placeholder without fallback names an unset variable
   */
  public static interpolate(text: string, variables: Variables, source: string): string {
    return text.replace(
      PLACEHOLDER,
      (match: string, escape: string, name: string, fallback: string | undefined): string => {
        if (escape) {
          return match.slice(1);
        }

        const value = variables[name];
        if (fallback !== undefined) {
          return value ? value : fallback;
        }
        if (value === undefined) {
          throw new ManifestLoadError(`unresolved variable '${name}'`, source);
        }
        return value;
      },
    );
  }
}
