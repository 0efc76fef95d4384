export interface RawItem {
  name: string | null;
  link: string | null;
  image: string | null;
  stockLabel: string | null;
}

export interface ItemExtractor {
  readonly mode: 'static' | 'rendered';
  extract(pageUrl: string): Promise<RawItem[]>;
}

function clean(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Null when the element yielded neither a name nor a link. */
export function toRawItem(fields: {
  name?: string | null;
  link?: string | null;
  image?: string | null;
  stockLabel?: string | null;
}): RawItem | null {
  const item: RawItem = {
    name: clean(fields.name),
    link: clean(fields.link),
    image: clean(fields.image),
    stockLabel: clean(fields.stockLabel),
  };
  if (!item.name && !item.link) return null;
  return item;
}
