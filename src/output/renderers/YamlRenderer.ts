/**
 * YamlRenderer - YAML 출력
 *
 * 콘텐츠마다 하나의 YAML 문서를 만들고 `---`로 구분합니다.
 */

import yaml from 'js-yaml';
import type { Content } from '../../types';
import { BaseRenderer } from './BaseRenderer';

export class YamlRenderer extends BaseRenderer {
  readonly format = 'yaml';

  protected readonly defaultSeparator = '---\n';

  protected renderContent(content: Content): string {
    return yaml.dump(this.toPlain(content), { noRefs: true, lineWidth: -1 });
  }
}
