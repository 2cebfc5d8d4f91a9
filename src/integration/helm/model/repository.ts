// SPDX-License-Identifier: Apache-2.0

/**
 * A named Helm chart repository.
 */
export class Repository {
  /**
   * @param name the local alias of the repository.
   * @param url  the url of the repository.
   * @throws Error if any of the arguments are blank.
   */
  public constructor(
    public readonly name: string,
    public readonly url: string,
  ) {
    if (!name?.trim()) {
      throw new Error('name must not be blank');
    }
    if (!url?.trim()) {
      throw new Error('url must not be blank');
    }
  }
}
