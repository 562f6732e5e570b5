import type {
  Block,
  DocumentFrontmatter,
  GuidelineDocument,
  VisualAssetKind,
} from '@tgdoc/model';

/**
 * Directory, relative to the .qmd files, that holds the asset images
 */
export const IMAGES_DIR = 'images';

interface AssetLabels {
  figure: string;
  table: string;
}

const LABELS: Record<string, AssetLabels> = {
  en: { figure: 'Figure', table: 'Table' },
  zh: { figure: '图', table: '表' },
  ja: { figure: '図', table: '表' },
  ko: { figure: '그림', table: '표' },
  fr: { figure: 'Figure', table: 'Tableau' },
  de: { figure: 'Abbildung', table: 'Tabelle' },
  es: { figure: 'Figura', table: 'Tabla' },
};

const CROSS_REF_PREFIX: Record<VisualAssetKind, string> = {
  figure: 'fig',
  table: 'tbl',
};

const UNTRANSLATED_MARKER = '<!-- untranslated -->';

/**
 * File name of an asset image, e.g. `figure_3.png`
 */
export function assetFileName(kind: VisualAssetKind, ordinal: number): string {
  return `${kind}_${ordinal}.png`;
}

/**
 * QmdRenderer
 *
 * Renders a GuidelineDocument as Quarto markdown. Rendering is a pure
 * function of the document and the language, so a source document and its
 * translation produce files with the same block layout.
 */
export class QmdRenderer {
  /**
   * Render a document. `language` is written to the `lang` field and picks
   * the figure and table labels.
   *
   * @example
   * Output:
   * ---
   * title: "OECD Test Guideline No. 432"
   * lang: zh-CN
   * ---
   *
   * ## 引言
   *
   * ![图 1](images/figure_1.png){#fig-1}
   */
  static render(document: GuidelineDocument, language: string): string {
    const labels = QmdRenderer.labelsFor(language);
    const body = document.blocks.map((block) =>
      QmdRenderer.renderBlock(block, labels),
    );

    const frontmatter = QmdRenderer.renderFrontmatter(
      document.frontmatter,
      language,
    );

    return `${[frontmatter, ...body].join('\n\n')}\n`;
  }

  static renderFrontmatter(
    frontmatter: DocumentFrontmatter,
    language: string,
  ): string {
    const fields: [string, string | undefined][] = [
      ['title', frontmatter.title],
      ['subtitle', frontmatter.subtitle],
      ['date', frontmatter.date],
      ['doc-number', frontmatter.docNumber],
      ['publication-date', frontmatter.publicationDate],
    ];

    const lines = fields
      .filter((field): field is [string, string] => field[1] !== undefined)
      .map(([key, value]) => `${key}: ${yamlString(value)}`);

    if (frontmatter.keywords && frontmatter.keywords.length > 0) {
      lines.push(
        `keywords: [${frontmatter.keywords.map(yamlString).join(', ')}]`,
      );
    }
    lines.push(`lang: ${language}`);

    return ['---', ...lines, '---'].join('\n');
  }

  private static renderBlock(block: Block, labels: AssetLabels): string {
    switch (block.type) {
      case 'heading':
        return QmdRenderer.markUntranslated(
          `${'#'.repeat(block.level)} ${block.text}`,
          block.untranslated,
        );
      case 'paragraph':
        return QmdRenderer.markUntranslated(
          escapeLeadingMarkup(block.text),
          block.untranslated,
        );
      case 'figure-ref':
      case 'table-ref': {
        const kind = block.type === 'figure-ref' ? 'figure' : 'table';
        const prefix = CROSS_REF_PREFIX[kind];
        return `![${labels[kind]} ${block.ordinal}](${IMAGES_DIR}/${assetFileName(kind, block.ordinal)}){#${prefix}-${block.ordinal}}`;
      }
      case 'page-break':
        return `<!-- page ${block.pageIndex} -->`;
      case 'reference-entry':
        return `(${block.index}) ${block.text}`;
    }
  }

  private static markUntranslated(
    text: string,
    untranslated: boolean | undefined,
  ): string {
    return untranslated ? `${UNTRANSLATED_MARKER}\n${text}` : text;
  }

  private static labelsFor(language: string): AssetLabels {
    const primary = language.toLowerCase().split(/[-_]/)[0];
    return LABELS[primary] ?? LABELS.en;
  }
}

/**
 * YAML double-quoted scalar. JSON string syntax is a subset of it.
 */
function yamlString(value: string): string {
  return JSON.stringify(value);
}

/**
 * Keep a paragraph that starts like a heading or list item from being read
 * as one
 */
function escapeLeadingMarkup(text: string): string {
  return /^(?:#|[-+*]\s|>)/.test(text) ? `\\${text}` : text;
}
