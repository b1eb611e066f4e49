/**
 * Type declarations for fft.js, which ships without typings
 */
declare module 'fft.js' {
  type ComplexArray = number[] | Float64Array | Float32Array;

  class FFT {
    constructor(size: number);
    readonly size: number;
    createComplexArray(): number[];
    toComplexArray(input: ArrayLike<number>, storage?: ComplexArray): number[];
    fromComplexArray(complex: ArrayLike<number>, storage?: number[]): number[];
    completeSpectrum(spectrum: ComplexArray): void;
    transform(output: ComplexArray, input: ArrayLike<number>): void;
    realTransform(output: ComplexArray, input: ArrayLike<number>): void;
    inverseTransform(output: ComplexArray, input: ArrayLike<number>): void;
  }

  export = FFT;
}
