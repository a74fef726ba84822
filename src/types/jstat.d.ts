// Basic type declarations for jstat

declare module 'jstat' {
    export interface jStat {
      normal: {
        inv(p: number, mean: number, std: number): number;
      };
    }

    const jStat: jStat;
    export default jStat;
  }
