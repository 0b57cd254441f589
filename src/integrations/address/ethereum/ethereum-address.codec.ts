import { Injectable } from '@nestjs/common';
import { getAddress, ZeroAddress } from 'ethers';

import type { IAddressCodec } from '../../../common/interfaces/address/address-codec.interfaces';

const ETHEREUM_ADDRESS_PATTERN: RegExp = /^0x[a-fA-F0-9]{40}$/;
// Catalog platforms use "" or a short "0x0" for native coins.
const NULL_ADDRESS_PATTERN: RegExp = /^(0x)?0*$/i;

@Injectable()
export class EthereumAddressCodec implements IAddressCodec {
  public validate(rawAddress: string): boolean {
    return ETHEREUM_ADDRESS_PATTERN.test(rawAddress.trim());
  }

  public normalize(rawAddress: string): string | null {
    const trimmedAddress: string = rawAddress.trim();

    if (this.isNullAddress(trimmedAddress)) {
      return ZeroAddress;
    }

    try {
      return getAddress(trimmedAddress.toLowerCase());
    } catch {
      return null;
    }
  }

  public isNullAddress(rawAddress: string): boolean {
    return NULL_ADDRESS_PATTERN.test(rawAddress.trim());
  }

  public isSameAddress(left: string, right: string): boolean {
    const normalizedLeft: string | null = this.normalize(left);
    const normalizedRight: string | null = this.normalize(right);

    if (normalizedLeft !== null && normalizedRight !== null) {
      return normalizedLeft === normalizedRight;
    }

    return left.trim().toLowerCase() === right.trim().toLowerCase();
  }
}
