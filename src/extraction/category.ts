import { Category, CategoryEstimate } from '../domain/models';

// Order matters: the first category with a matching keyword wins, so an item
// described as "boots + jacket" is footwear.
const CATEGORY_KEYWORDS: ReadonlyArray<readonly [Category, readonly string[]]> = [
    [Category.Footwear, ['boot', 'sneaker', 'shoe', 'sandal', 'loafer', 'スニーカー', 'ブーツ', '靴']],
    [Category.Outerwear, ['jacket', 'coat', 'blazer', 'parka', 'bomber', 'ジャケット', 'コート']],
    [Category.Pants, ['pant', 'jean', 'trouser', 'パンツ', 'ジーンズ', 'デニム']],
    [Category.TShirt, ['t-shirt', 'tshirt', 'tee', 'shirt', 'top', 'blouse', 'tシャツ', 'シャツ']],
    [Category.Hoodie, ['hoodie', 'sweatshirt', 'sweater', 'pullover', 'フーディ', 'スウェット']],
    [Category.Dress, ['dress', 'skirt', 'ドレス', 'スカート']],
    [Category.Accessories, ['bag', 'wallet', 'purse', 'backpack', 'バッグ', '財布']],
    [Category.Jewelry, ['jewelry', 'necklace', 'ring', 'bracelet', 'watch', 'アクセサリー', '時計']],
];

// Packed-parcel estimates (kg, cm). Only used when the page gave us nothing.
const CATEGORY_ESTIMATES: Readonly<Record<Category, Readonly<CategoryEstimate>>> = Object.freeze({
    [Category.Footwear]: { weight: 1.2, length: 35, width: 25, height: 15 },     // shoe box
    [Category.Outerwear]: { weight: 0.8, length: 45, width: 35, height: 10 },
    [Category.Pants]: { weight: 0.4, length: 40, width: 30, height: 5 },
    [Category.TShirt]: { weight: 0.2, length: 30, width: 25, height: 3 },
    [Category.Hoodie]: { weight: 0.6, length: 35, width: 30, height: 8 },
    [Category.Dress]: { weight: 0.5, length: 40, width: 30, height: 5 },
    [Category.Accessories]: { weight: 0.3, length: 25, width: 20, height: 10 },
    [Category.Jewelry]: { weight: 0.1, length: 15, width: 10, height: 5 },
    [Category.General]: { weight: 0.4, length: 35, width: 25, height: 10 },
});

export function classifyCategory(name: string, description: string = ''): Category {
    const text = `${name} ${description}`.toLowerCase();
    for (const [category, keywords] of CATEGORY_KEYWORDS) {
        if (keywords.some(word => text.includes(word))) {
            return category;
        }
    }
    return Category.General;
}

export function estimateForCategory(category: Category): CategoryEstimate {
    return { ...CATEGORY_ESTIMATES[category] };
}
