declare module 'alea' {
  interface AleaPRNG {
    (): number;
    next(): number;
    uint32(): number;
    fract53(): number;
    exportState(): [number, number, number, number];
    importState(state: [number, number, number, number]): void;
  }

  function Alea(...seeds: Array<string | number>): AleaPRNG;

  export default Alea;
}
