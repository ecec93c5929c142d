/// # page styles
///
/// inlined into every document, so the output opens offline with nothing to
/// fetch. the look is plain and print-first: monospace throughout, a grey
/// header bar per file, line numbers in a gutter drawn with a css counter.
/// token colors are not here; they come from the highlighter's palette and
/// are appended after these rules.

export const defaultCss = `
* {
  margin: 0;
  padding: 0;
  box-sizing: border-box;
}

body {
  font-family: 'SF Mono', 'Menlo', 'Consolas', 'Liberation Mono', monospace;
  font-size: 13px;
  line-height: 1.4;
  background: #fff;
  color: #24292e;
  padding-left: 16px;
}

.toc {
  padding: 16px;
  background: #f8f8f8;
  border-bottom: 1px solid #ddd;
  margin-bottom: 16px;
}

.toc h2 {
  font-size: 14px;
  margin-bottom: 8px;
  color: #333;
}

.toc ul {
  list-style: none;
}

.toc li {
  margin-bottom: 4px;
}

.toc a {
  color: #0366d6;
  text-decoration: none;
  font-size: 12px;
}

.toc a:hover {
  text-decoration: underline;
}

.file-section {
  margin-bottom: 24px;
}

.file-header {
  font-size: 14px;
  font-weight: bold;
  padding: 8px 12px;
  border-bottom: 1px solid #ccc;
  background: #e0e0e0;
  -webkit-print-color-adjust: exact;
  print-color-adjust: exact;
}

.code {
  margin: 0;
  white-space: pre;
  counter-reset: line;
}

.code .line::before {
  counter-increment: line;
  content: counter(line);
  display: inline-block;
  width: 4ch;
  margin-right: 10px;
  padding-right: 5px;
  text-align: right;
  color: #999;
  background: #f8f8f8;
  border-right: 1px solid #eee;
  user-select: none;
}

.code .line:target {
  background: #fffbdd;
}

@media print {
  body {
    font-size: 10px;
    padding-left: 0;
  }

  .toc {
    page-break-after: always;
  }

  .file-section {
    page-break-before: always;
  }

  .file-section:first-of-type {
    page-break-before: avoid;
  }

  .file-header {
    font-size: 12px;
    padding: 6px 8px;
    background: #d0d0d0;
    border-bottom: 2px solid #999;
  }
}

@page {
  size: A4;
  margin: 0.7cm 0.7cm 1.5cm 0.7cm;
}
`;
