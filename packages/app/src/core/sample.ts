// Document used when neither --input nor --text is given.
export const sampleDocument = `{
  "name": "json-descent",
  "version": 1.5,
  "stable": false,
  "license": null,
  "tags": ["tokenizer", "parser"],
  "escapes": "tab\\there, quote \\" and slash \\/"
}`
