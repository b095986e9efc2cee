// feed 排序：按过滤表达式同名字段排序；缺失值总在最后，平局按 slug 升序，保证结果可复现

import { ABSENT, readField } from "../filter/fields.js";
import type { Resolved } from "../filter/fields.js";
import { orderOf } from "../filter/evaluator.js";
import type { Item } from "../types/item.js";


export function sortItems(items: readonly Item[], field: string, reverse: boolean): Item[] {
  const keyed = items.map<{ item: Item; key: Resolved }>((item) => ({ item, key: readField(item, field) }));
  keyed.sort((a, b) => {
    if (a.key === ABSENT || b.key === ABSENT) {
      if (a.key !== ABSENT) return -1;
      if (b.key !== ABSENT) return 1;
    } else {
      const order = orderOf(a.key, b.key) ?? 0;
      if (order !== 0) return reverse ? -order : order;
    }
    return a.item.slug < b.item.slug ? -1 : a.item.slug > b.item.slug ? 1 : 0;
  });
  return keyed.map((k) => k.item);
}
