// neo-blessed ships no typings; its API matches blessed, so reuse @types/blessed
declare module 'neo-blessed' {
  import * as blessed from 'blessed';
  export = blessed;
}
