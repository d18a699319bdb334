// Typings of the pdf-parse entry point, for its implementation module
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdf = require('pdf-parse');
  export = pdf;
}
