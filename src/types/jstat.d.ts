// Type declarations for the parts of jstat used here; the package ships none.

declare module 'jstat' {
  export interface jStat {
    normal: {
      inv(p: number, mean: number, std: number): number;
    };

    studentt: {
      inv(p: number, dof: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
