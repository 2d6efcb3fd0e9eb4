export { EmojiTransformer } from './EmojiTransformer';
export { RemoveColorsTransformer } from './RemoveColorsTransformer';
