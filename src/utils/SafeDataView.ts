/**
 * SafeDataView: Safe byte reading wrapper
 *
 * Bounds-checked little-endian reads over a DICOM byte stream. Every read
 * past the end throws, so a truncated file surfaces as a parse error instead
 * of a silently shortened dataset.
 */

export class SafeDataView {
  private readonly view: DataView;
  private offset: number;

  constructor(buffer: ArrayBuffer, byteOffset: number = 0, byteLength?: number) {
    this.view = new DataView(buffer, byteOffset, byteLength);
    this.offset = 0;
  }

  get byteLength(): number {
    return this.view.byteLength;
  }

  getPosition(): number {
    return this.offset;
  }

  setPosition(position: number): void {
    if (position < 0 || position > this.view.byteLength) {
      throw new Error(`Position ${position} out of bounds (max: ${this.view.byteLength})`);
    }
    this.offset = position;
  }

  getRemainingBytes(): number {
    return this.view.byteLength - this.offset;
  }

  readUint16(): number {
    this.ensureAvailable(2);
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  peekUint16(): number {
    if (this.offset + 2 > this.view.byteLength) {
      throw new Error(`Peek beyond buffer at offset ${this.offset}`);
    }
    return this.view.getUint16(this.offset, true);
  }

  /**
   * Read a (group, element) pair.
   */
  readTag(): { group: number; element: number } {
    const group = this.readUint16();
    const element = this.readUint16();
    return { group, element };
  }

  /**
   * Read a two-character VR code.
   */
  readVR(): string {
    const bytes = this.readBytes(2);
    return String.fromCharCode(bytes[0], bytes[1]);
  }

  /**
   * View onto the next `length` bytes (no copy).
   */
  readBytes(length: number): Uint8Array {
    this.ensureAvailable(length);
    const bytes = new Uint8Array(this.view.buffer, this.view.byteOffset + this.offset, length);
    this.offset += length;
    return bytes;
  }

  /**
   * Bytes between two absolute positions (no copy, position unchanged).
   */
  slice(start: number, end: number): Uint8Array {
    if (start < 0 || end > this.view.byteLength || start > end) {
      throw new Error(`Slice ${start}..${end} out of bounds (max: ${this.view.byteLength})`);
    }
    return new Uint8Array(this.view.buffer, this.view.byteOffset + start, end - start);
  }

  skip(length: number): void {
    this.ensureAvailable(length);
    this.offset += length;
  }

  private ensureAvailable(length: number): void {
    if (this.offset + length > this.view.byteLength) {
      throw new Error(
        `Read beyond buffer: need ${length} bytes at offset ${this.offset}, have ${this.view.byteLength - this.offset}`
      );
    }
  }
}
