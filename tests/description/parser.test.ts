import { describe, expect, it } from 'vitest';

import { labeledLines, parseDescription } from '../../src/description/parser.js';

describe('parseDescription', () => {
  it('maps normal-mode labels to their fields', () => {
    const parsed = parseDescription('主要内容：海边日落\n对象：太阳 海浪\n颜色：橙色', 'normal');

    expect(parsed).toEqual({
      summary: '海边日落',
      objects: '太阳 海浪',
      colors: '橙色'
    });
  });

  it('maps screenshot-mode labels to their fields', () => {
    const description = [
      '主要内容：系统设置页面',
      '文字内容：通用 隐私 关于本机',
      '应用信息：系统设置',
      '界面元素：按钮 开关',
      '功能区域：侧边栏',
      '主题色彩：浅灰'
    ].join('\n');

    expect(parseDescription(description, 'screenshot')).toEqual({
      summary: '系统设置页面',
      text_content: '通用 隐私 关于本机',
      app_info: '系统设置',
      ui_elements: '按钮 开关',
      function_areas: '侧边栏',
      colors: '浅灰'
    });
  });

  it('keeps the later value when a label repeats', () => {
    expect(parseDescription('对象：猫\n对象：狗', 'normal')).toEqual({ objects: '狗' });
  });

  it('trims lines and values and drops blank or unlabeled lines', () => {
    const parsed = parseDescription('  场景：  公园  \n\n随便写的一行\n', 'normal');

    expect(parsed).toEqual({ scene: '公园' });
  });

  it('only recognizes labels at the start of a line', () => {
    expect(parseDescription('描述 对象：猫', 'normal')).toEqual({});
  });

  it('ignores labels that belong to the other mode', () => {
    expect(parseDescription('对象：猫\n风格：卡通', 'screenshot')).toEqual({});
    expect(parseDescription('文字内容：登录', 'normal')).toEqual({});
  });

  it('stores an empty value for a label without text', () => {
    expect(parseDescription('风格：', 'normal')).toEqual({ style: '' });
  });

  it('handles CRLF line endings', () => {
    expect(parseDescription('主要内容：雪山\r\n对象：松树', 'normal')).toEqual({
      summary: '雪山',
      objects: '松树'
    });
  });

  it('returns an empty mapping for empty input', () => {
    expect(parseDescription('', 'normal')).toEqual({});
    expect(parseDescription('   \n  ', 'screenshot')).toEqual({});
  });
});

describe('labeledLines', () => {
  it('yields the matching rule and trimmed value for each labeled line', () => {
    const lines = [...labeledLines('文字：无\n情感：宁静 悠远', 'normal')];

    expect(lines.map(line => [line.rule.key, line.rule.tokenizer, line.value])).toEqual([
      ['text', 'phrases', '无'],
      ['emotion', 'words', '宁静 悠远']
    ]);
  });
});
