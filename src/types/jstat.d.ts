// jstat ships no type declarations; only the inverse CDFs used here are declared.

declare module 'jstat' {
  export interface jStat {
    normal: {
      inv(p: number, mean: number, std: number): number;
    };

    studentt: {
      inv(p: number, dof: number): number;
    };

    cauchy: {
      inv(p: number, local: number, scale: number): number;
    };

    uniform: {
      inv(p: number, a: number, b: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
