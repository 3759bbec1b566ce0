export default {
  resultDb: "./examples/results",
  archive: {
    maxDepth: 2,
  },
};
