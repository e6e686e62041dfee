/** Well-known storefront addresses, all absolute */
export interface SiteUrls {
	base: string;
	login: string;
	register: string;
	cart: string;
	myAccount: string;
	myOrders: string;
	myFavorites: string;
	myCoupons: string;
	help: string;
	aboutUs: string;
	plus: string;
	categories: {
		electronics: string;
		womenFashion: string;
		menFashion: string;
		home: string;
	};
	/** Search results for a keyword */
	search(keyword: string): string;
	/** Product detail page for a path such as "apple/macbook-air-p-123" */
	product(slug: string): string;
}

export function createSiteUrls(baseURL: string): SiteUrls {
	const base = baseURL.endsWith('/') ? baseURL : `${baseURL}/`;
	const at = (path: string) => `${base}${path}`;

	return {
		base,
		login: at('giris'),
		register: at('uye-ol'),
		cart: at('sepet'),
		myAccount: at('Hesabim'),
		myOrders: at('Hesabim/Siparislerim'),
		myFavorites: at('Hesabim/Favoriler'),
		myCoupons: at('Hesabim/IndirimKuponlari'),
		help: at('yardim'),
		aboutUs: at('s/meet-us#whoweare'),
		plus: at('trendyolplus'),
		categories: {
			electronics: at('butik/liste/5/elektronik'),
			womenFashion: at('butik/liste/1/kadin'),
			menFashion: at('butik/liste/2/erkek'),
			home: at('butik/liste/12/ev--mobilya'),
		},
		search: (keyword) => at(`sr?q=${keyword.replace(/ /g, '%20')}`),
		product: (slug) => at(slug.replace(/^\/+/, '')),
	};
}
