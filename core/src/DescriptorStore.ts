import { DeferredMintError } from './errors.js'
import type { DescriptorStore, DescriptorStoreState } from './types.js'

/**
 * Resolves descriptors by prefixing a configurable base path.
 */
export class BaseDescriptorStore implements DescriptorStore {
  private path: string

  constructor(basePath: string = '') {
    this.path = BaseDescriptorStore.validate(basePath)
  }

  basePath(): string {
    return this.path
  }

  setBasePath(path: string): void {
    this.path = BaseDescriptorStore.validate(path)
  }

  resolve(descriptor: string): string {
    return `${this.path}${descriptor}`
  }

  snapshot(): DescriptorStoreState {
    return { basePath: this.path }
  }

  restore(state: DescriptorStoreState): void {
    this.path = BaseDescriptorStore.validate(state.basePath)
  }

  private static validate(path: unknown): string {
    if (typeof path !== 'string') {
      throw new DeferredMintError('InvalidArgument', 'base descriptor path must be a string')
    }
    return path
  }
}
