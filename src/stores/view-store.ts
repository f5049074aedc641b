import { createStore } from 'zustand/vanilla';
import type { TmxDocument, TranslationUnit, UnitId } from '../types/tmx';
import type { DocumentStore } from './document-store';
import { DEFAULT_PAGE_SIZE } from '../constants/defaults';
import { findVariant, plainText } from '../utils/text-runs';

export interface ViewState {
  /** Matched against every variant; empty means no filter */
  filterText: string;
  /** Per-language filters, keyed by language code */
  languageFilters: Record<string, string>;
  filteredIds: readonly UnitId[];
  /** Content changed under an active filter; recomputed on the next query */
  stale: boolean;
  currentPage: number;
  pageSize: number;

  setFilter: (text: string) => void;
  setLanguageFilter: (language: string, text: string) => void;
  clearFilters: () => void;
  setPageSize: (size: number) => void;

  // Queries
  page: (index: number, size: number) => UnitId[];
  pageUnits: (index: number, size: number) => TranslationUnit[];
  totalFilteredCount: () => number;
  totalUnfilteredCount: () => number;

  // Navigation
  totalPages: () => number;
  goToPage: (index: number) => void;
  nextPage: () => void;
  prevPage: () => void;
  firstPage: () => void;
  lastPage: () => void;
  currentPageIds: () => UnitId[];

  /** Stop following the document store */
  dispose: () => void;
}

export interface ViewOptions {
  pageSize?: number;
}

interface FilterSpec {
  filterText: string;
  languageFilters: Record<string, string>;
}

function hasFilter(spec: FilterSpec): boolean {
  return spec.filterText !== '' || Object.keys(spec.languageFilters).length > 0;
}

function matches(unit: TranslationUnit, needle: string, languageNeedles: [string, string][]): boolean {
  if (needle && !unit.variants.some((v) => plainText(v.content).toLowerCase().includes(needle))) return false;
  return languageNeedles.every(([language, text]) => {
    const variant = findVariant(unit.variants, language);
    return variant !== undefined && plainText(variant.content).toLowerCase().includes(text);
  });
}

/** Ids of the units passing every filter, in document order */
export function filterUnits(doc: TmxDocument, spec: FilterSpec): readonly UnitId[] {
  if (!hasFilter(spec)) return doc.order;
  const needle = spec.filterText.toLowerCase();
  const languageNeedles = Object.entries(spec.languageFilters).map(([language, text]): [string, string] => [
    language,
    text.toLowerCase(),
  ]);
  return doc.order.filter((id) => {
    const unit = doc.units.get(id);
    return unit !== undefined && matches(unit, needle, languageNeedles);
  });
}

function assertPageSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Page size must be a positive integer, got ${size}`);
  }
}

export function createViewStore(documentStore: DocumentStore, options: ViewOptions = {}) {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  assertPageSize(pageSize);

  const view = createStore<ViewState>()((set, get) => {
    const refilter = (spec: FilterSpec) => ({
      ...spec,
      filteredIds: filterUnits(documentStore.getState().document, spec),
      stale: false,
      currentPage: 0,
    });

    /** Filtered ids, recomputing first when an edit made them stale */
    const fresh = (): readonly UnitId[] => {
      const state = get();
      if (!state.stale) return state.filteredIds;
      const filteredIds = filterUnits(documentStore.getState().document, state);
      const lastPage = Math.max(1, Math.ceil(filteredIds.length / state.pageSize)) - 1;
      set({ filteredIds, stale: false, currentPage: Math.min(state.currentPage, lastPage) });
      return filteredIds;
    };

    const lastPageIndex = () => Math.max(1, Math.ceil(fresh().length / get().pageSize)) - 1;

    return {
      filterText: '',
      languageFilters: {},
      filteredIds: documentStore.getState().document.order,
      stale: false,
      currentPage: 0,
      pageSize,

      setFilter: (text) => set(refilter({ filterText: text, languageFilters: get().languageFilters })),
      setLanguageFilter: (language, text) => {
        const languageFilters = { ...get().languageFilters };
        if (text === '') delete languageFilters[language];
        else languageFilters[language] = text;
        set(refilter({ filterText: get().filterText, languageFilters }));
      },
      clearFilters: () => set(refilter({ filterText: '', languageFilters: {} })),
      setPageSize: (size) => {
        assertPageSize(size);
        set({ pageSize: size, currentPage: 0 });
      },

      page: (index, size) => {
        assertPageSize(size);
        if (!Number.isInteger(index) || index < 0) return [];
        return fresh().slice(index * size, (index + 1) * size);
      },
      pageUnits: (index, size) => {
        const { units } = documentStore.getState().document;
        return get()
          .page(index, size)
          .flatMap((id) => {
            const unit = units.get(id);
            return unit ? [unit] : [];
          });
      },
      totalFilteredCount: () => fresh().length,
      totalUnfilteredCount: () => documentStore.getState().document.order.length,

      totalPages: () => lastPageIndex() + 1,
      goToPage: (index) => set({ currentPage: Math.min(Math.max(0, Math.trunc(index)), lastPageIndex()) }),
      nextPage: () => get().goToPage(get().currentPage + 1),
      prevPage: () => get().goToPage(get().currentPage - 1),
      firstPage: () => get().goToPage(0),
      lastPage: () => get().goToPage(lastPageIndex()),
      currentPageIds: () => {
        fresh();
        return get().page(get().currentPage, get().pageSize);
      },

      dispose: () => unsubscribe(),
    };
  });

  const unsubscribe = documentStore.subscribe((state, prev) => {
    const doc = state.document;
    const before = prev.document;
    if (doc === before) return;

    const spec = view.getState();
    if (doc.id !== before.id || doc.order !== before.order) {
      view.setState({ filteredIds: filterUnits(doc, spec), stale: false, currentPage: 0 });
    } else if (hasFilter(spec)) {
      view.setState({ stale: true });
    }
  });

  return view;
}

export type ViewStore = ReturnType<typeof createViewStore>;
