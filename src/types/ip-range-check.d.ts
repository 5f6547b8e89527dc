declare module 'ip-range-check' {
  function ipRangeCheck(address: string, range: string | string[]): boolean;
  export = ipRangeCheck;
}
