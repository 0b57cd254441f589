export interface IAddressCodec {
  validate(rawAddress: string): boolean;
  normalize(rawAddress: string): string | null;
  isNullAddress(rawAddress: string): boolean;
  isSameAddress(left: string, right: string): boolean;
}
