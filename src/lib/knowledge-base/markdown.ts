/**
 * Markdown 纯文本提取
 * 去掉 front matter、代码围栏标记、标题符号、强调、链接、图片、HTML 标签，
 * 按行 trim 并丢弃空行
 */

export function extractTextFromMarkdown(markdown: string): string {
  let text = markdown.replace(/\r\n?/g, '\n');

  // front matter
  text = text.replace(/^---\n[\s\S]*?\n---(\n|$)/, '');
  // Obsidian 注释
  text = text.replace(/%%[\s\S]*?%%/g, '');
  // HTML 注释和标签
  text = text.replace(/<!--[\s\S]*?-->/g, '');
  text = text.replace(/<[^>\n]+>/g, '');
  // 代码围栏（保留代码内容）
  text = text.replace(/^\s*(```|~~~).*$/gm, '');
  // 图片、嵌入
  text = text.replace(/!\[\[[^\]]*\]\]/g, '');
  text = text.replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1');
  // wiki 链接：[[目标|别名]] -> 别名，[[目标#标题]] -> 目标
  text = text.replace(/\[\[([^\]|]+)\|([^\]]+)\]\]/g, '$2');
  text = text.replace(/\[\[([^\]#]+)(#[^\]]*)?\]\]/g, '$1');
  // 普通链接
  text = text.replace(/\[([^\]]*)\]\([^)]*\)/g, '$1');
  // 标题、引用、列表符号、分隔线
  text = text.replace(/^\s{0,3}#{1,6}\s+/gm, '');
  text = text.replace(/^\s*>\s?/gm, '');
  text = text.replace(/^\s*[-*+]\s+\[[ xX]\]\s+/gm, '');
  text = text.replace(/^\s*[-*+]\s+/gm, '');
  text = text.replace(/^\s*([-*_]\s*){3,}$/gm, '');
  // 强调、删除线、高亮、行内代码
  text = text.replace(/(\*\*|__)(.+?)\1/g, '$2');
  text = text.replace(/(\*|_)(\S(?:.*?\S)?)\1/g, '$2');
  text = text.replace(/(~~|==)(.+?)\1/g, '$2');
  text = text.replace(/`([^`]+)`/g, '$1');

  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}
