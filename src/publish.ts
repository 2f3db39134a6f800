import { UnimplementedError } from './errors';

/**
 * Publishing is not supported. Always rejects so it can never pass for a successful put.
 */
export async function publish(_sourceDir: string): Promise<never> {
    throw new UnimplementedError('not implemented: this resource cannot publish');
}
