// MUST be imported FIRST in index.ts.
//
// The MCP stdio transport owns stdout for JSON-RPC; a stray console.log from
// any dependency corrupts the stream and the client disconnects. ES module
// imports are hoisted, so this side-effect module has to come first.

console.log = (...args: unknown[]) => {
  console.error(...args);
};
