/**
 * A tokenized X12 segment.
 *
 * Elements are 1-indexed by X12 convention: element(1) is CLM01, element(2) is CLM02.
 * Composite elements keep their original string form; components are split
 * on demand.
 */

import type { X12Delimiters } from './X12Delimiters.js';

export class Segment {
  readonly elements: readonly string[];

  constructor(
    readonly id: string,
    elements: readonly string[],
    readonly position: number,
    readonly componentSeparator: string
  ) {
    this.elements = Object.freeze([...elements]);
  }

  /**
   * Element value by 1-based index; '' when the segment does not carry it.
   */
  element(index: number): string {
    return this.elements[index - 1] ?? '';
  }

  hasValue(index: number): boolean {
    return this.element(index) !== '';
  }

  isComposite(index: number): boolean {
    return this.element(index).includes(this.componentSeparator);
  }

  /**
   * Components of an element. Empty components, including trailing ones, are kept.
   * A non-composite element yields a single component.
   */
  components(index: number): string[] {
    return this.element(index).split(this.componentSeparator);
  }

  /**
   * Component by 1-based element and component index; '' when absent.
   */
  component(index: number, componentIndex: number): string {
    return this.components(index)[componentIndex - 1] ?? '';
  }

  /**
   * Segment text without its terminator.
   */
  render(elementSeparator: string): string {
    return [this.id, ...this.elements].join(elementSeparator);
  }
}

/**
 * Re-join a segment sequence into transaction text.
 */
export function renderSegments(segments: readonly Segment[], delimiters: X12Delimiters): string {
  const terminator = delimiters.segmentTerminator + delimiters.lineSuffix;
  return segments.map((segment) => segment.render(delimiters.elementSeparator) + terminator).join('');
}
