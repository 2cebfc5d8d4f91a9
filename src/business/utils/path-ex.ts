// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import fs from 'node:fs';
import {FleetError} from '../../core/errors/fleet-error.js';

export class PathEx {
  /**
   * This method requires that the path to a directory or file is real and exists.
   *
   * Use this instead of path.join(...) directly when the joined path must already exist on disk.
   * @param paths - The paths to join
   */
  public static joinWithRealPath(...paths: string[]): string {
    // nosemgrep
    return fs.realpathSync(path.join(...paths));
  }

  /**
   * Joins paths and refuses any result that escapes the base directory. The base directory must be real and exist;
   * the joined path does not have to exist yet.
   *
   * @param baseDirectory - The base directory to enforce
   * @param paths - The paths to join
   * @throws FleetError if the resolved path is outside the base directory.
   * @returns The safely joined path.
   */
  public static safeJoinWithBaseDirConfinement(baseDirectory: string, ...paths: string[]): string {
    // nosemgrep: javascript_pathtraversal_rule-non-literal-fs-filename
    const resolvedBase: string = fs.realpathSync(baseDirectory);
    const resolvedPath: string = path.resolve(resolvedBase, ...paths);

    if (resolvedPath !== resolvedBase && !resolvedPath.startsWith(resolvedBase + path.sep)) {
      throw new FleetError(`Path traversal detected: ${resolvedPath} is outside ${resolvedBase}`);
    }

    return resolvedPath;
  }

  /**
   * Joins the given paths. This is a wrapper around path.join. It is recommended to only use this when you are dealing
   * with part of a path that is not a complete path reference on its own.
   *
   * For more information see: https://owasp.org/www-community/attacks/Path_Traversal
   * @param paths
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths. This is a wrapper around path.resolve.
   * @param paths
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }
}
