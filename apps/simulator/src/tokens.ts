export const PRICE_SOURCE = Symbol("PRICE_SOURCE");
export const NEWS_SOURCE = Symbol("NEWS_SOURCE");
export const RECOMMENDER = Symbol("RECOMMENDER");
