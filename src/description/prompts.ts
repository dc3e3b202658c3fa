import type { DescriptionMode } from '../types/index.js';

const NORMAL_PROMPT = `分析这张图片并生成搜索友好的描述。请按以下格式输出：

主要内容：[简短描述主体内容]
对象：[列出具体的物体、人物等，用空格分隔]
场景：[描述环境场所]
颜色：[主要颜色]
风格：[如现代、复古、卡通等]
文字：[如有文字内容则列出]
情感：[如快乐、宁静、热闹等]

要求：
1. 每个分类用简洁的关键词，避免完整句子
2. 优先使用常用搜索词汇
3. 用中文输出
4. 如某类别无内容可省略

示例：
主要内容：湖边晨雾风景照
对象：湖泊 小船 芦苇 远山
场景：湖畔 清晨
颜色：灰色 白色 绿色
风格：自然风光
情感：宁静 悠远`;

const SCREENSHOT_PROMPT = `这是一张屏幕截图。请识别其中的文字和界面信息，按以下格式输出：

主要内容：[一句话概括截图内容]
文字内容：[尽可能完整地列出截图中所有可见文字，用空格分隔]
应用信息：[应用或网站名称]
界面元素：[按钮、菜单、对话框等，用空格分隔]
功能区域：[如侧边栏、工具栏、编辑区等，用空格分隔]
主题色彩：[界面主色调]

要求：
1. 文字内容优先，保持原文，不要翻译
2. 其余分类用简洁的关键词
3. 用中文输出
4. 如某类别无内容可省略`;

export const VISION_PROMPTS: Record<DescriptionMode, string> = {
  normal: NORMAL_PROMPT,
  screenshot: SCREENSHOT_PROMPT
};

/** Screenshots carry more text, so they get a larger completion budget */
export const VISION_MAX_TOKENS: Record<DescriptionMode, number> = {
  normal: 300,
  screenshot: 500
};
