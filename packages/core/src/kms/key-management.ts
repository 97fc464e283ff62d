import { CIPHER_DATA_ID_PREFIX } from '../config/defaults.js';
import { DecryptError, errorMessage } from '../errors.js';

/** At-rest decryption for configs whose dataId carries the cipher prefix. */
export interface KeyManagement {
    decrypt(ciphertext: string): Promise<string>;
}

export function isCipherDataId(dataId: string): boolean {
    return dataId.startsWith(CIPHER_DATA_ID_PREFIX);
}

export async function decryptIfNeeded(dataId: string, content: string, keyManagement?: KeyManagement): Promise<string> {
    if (!keyManagement || !isCipherDataId(dataId)) {
        return content;
    }
    try {
        return await keyManagement.decrypt(content);
    } catch (error) {
        throw new DecryptError(`kms decrypt failed for '${dataId}': ${errorMessage(error)}`, { cause: error });
    }
}
